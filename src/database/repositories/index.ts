export { DocumentRepository } from './base.repository.js';
export { BatchRepository } from './batch.repository.js';
export { LinkRepository, type LinkListener } from './link.repository.js';
