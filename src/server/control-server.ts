import Fastify, { type FastifyInstance } from 'fastify';
import { ZodError, z } from 'zod';
import type { DatabaseService } from '../database/database.service.js';
import { LINK_STATUSES, MANUAL_STATUSES } from '../database/database.types.js';
import type { DownloadQueueService } from '../jobs/download-queue.service.js';
import type { ChannelLimitPrompt } from '../jobs/limit-prompt.js';
import type { RuleAuthoringAnswer } from '../services/classifier.service.js';
import type { FilterService } from '../services/filter.service.js';
import type { IngestionService } from '../services/ingestion.service.js';
import type { ChannelRuleAuthoring } from '../services/rule-authoring.js';
import { logger } from '../utils/logger/logger.service.js';
import { filterEnabledSchema, moveFilterSchema, reorderFilterSchema } from '../utils/validators/filter.schemas.js';

export interface ControlServerDeps {
  database: DatabaseService;
  filters: FilterService;
  ingestion: IngestionService;
  downloads: DownloadQueueService;
  authoring: ChannelRuleAuthoring;
  limitPrompt: ChannelLimitPrompt;
}

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const decisionParamsSchema = z.object({
  id: z.string().min(1),
});

const linksQuerySchema = z.object({
  status: z.enum(LINK_STATUSES).optional(),
});

const linkStatusSchema = z.object({
  urls: z.array(z.string().min(1)).min(1),
  status: z.enum(MANUAL_STATUSES),
});

const createFilterSchema = z.object({
  filter: z.unknown(),
  insertAt: z.number().int().min(0).optional(),
});

const skipSchema = z
  .object({
    slot: z.number().int().min(0).optional(),
  })
  .default({});

const retrySchema = z.object({
  url: z.string().min(1),
});

const limitAnswerSchema = z.object({
  decision: z.enum(['continue', 'skip']),
});

const authoringAnswerSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('create'), draft: z.unknown() }),
  z.object({ action: z.literal('cancel') }),
]);

const clipboardSchema = z.object({
  text: z.string(),
});

const ingestFileSchema = z.object({
  path: z.string().min(1),
  force: z.boolean().optional(),
});

const ingestDirectorySchema = z
  .object({
    dir: z.string().min(1).optional(),
  })
  .default({});

/**
 * HTTP status for a service result: validation errors are 400, missing
 * entities 404, refused operations 409.
 */
function statusOf(result: { success: boolean; message?: string; errors?: string[] }): number {
  if (result.success) {
    return 200;
  }
  if (result.errors && result.errors.length > 0) {
    return 400;
  }
  return result.message?.endsWith('not found') ? 404 : 409;
}

/**
 * Operator control API over the classifier, filter management, ingestion and
 * download queue. Operations that may prompt for a decision hold the request
 * open until the decision is answered through the decision routes.
 */
export function createControlServer(deps: ControlServerDeps): FastifyInstance {
  const { database, filters, ingestion, downloads, authoring, limitPrompt } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400).send({
        success: false,
        message: 'Invalid request',
        errors: error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)),
      });
      return;
    }

    logger.error(`Request ${request.method} ${request.url} failed:`, error);
    reply.code(error.statusCode ?? 500).send({ success: false, message: error.message });
  });

  app.get('/health', async () => ({
    status: 'ok',
    store: database.healthCheck(),
    downloads: downloads.getStats(),
    timestamp: new Date().toISOString(),
  }));

  // Links

  app.get('/links', async (request) => {
    const { status } = linksQuerySchema.parse(request.query);
    const links = status ? database.links.byStatus(status) : [...database.links.query()];
    return { links, counts: database.links.countByStatus() };
  });

  app.put('/links/status', async (request, reply) => {
    const { urls, status } = linkStatusSchema.parse(request.body);
    const result = await filters.setLinkStatus(urls, status);
    return reply.code(statusOf(result)).send(result);
  });

  // Filters

  app.get('/filters', async () => filters.listFilters());

  app.post('/filters', async (request, reply) => {
    const { filter, insertAt } = createFilterSchema.parse(request.body);
    const result = await filters.createFilter(filter, insertAt);
    return reply.code(result.success ? 201 : statusOf(result)).send(result);
  });

  app.put('/filters/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const result = await filters.updateFilter(id, request.body);
    return reply.code(statusOf(result)).send(result);
  });

  app.delete('/filters/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const result = await filters.deleteFilter(id);
    return reply.code(statusOf(result)).send(result);
  });

  app.post('/filters/:id/move', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const { direction } = moveFilterSchema.parse(request.body);
    const result = await filters.moveFilter(id, direction);
    return reply.code(statusOf(result)).send(result);
  });

  app.post('/filters/:id/reorder', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const { index } = reorderFilterSchema.parse(request.body);
    const result = await filters.reorderFilter(id, index);
    return reply.code(statusOf(result)).send(result);
  });

  app.post('/filters/:id/enabled', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const { enabled } = filterEnabledSchema.parse(request.body);
    const result = await filters.setFilterEnabled(id, enabled);
    return reply.code(statusOf(result)).send(result);
  });

  app.get('/filters/:id/links', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    if (!database.filters.get(id)) {
      return reply.code(404).send({ success: false, message: 'Filter not found' });
    }
    return { success: true, links: filters.affectedLinks(id) };
  });

  app.post('/filters/:id/reprocess', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return { success: true, ...(await filters.reprocessAffected(id)) };
  });

  // Downloads

  app.post('/downloads/start', async () => {
    downloads.start();
    return { success: true, state: downloads.currentState };
  });

  app.post('/downloads/pause', async (_request, reply) => {
    const success = downloads.pause();
    return reply.code(success ? 200 : 409).send({ success, state: downloads.currentState });
  });

  app.post('/downloads/resume', async (_request, reply) => {
    const success = downloads.resume();
    return reply.code(success ? 200 : 409).send({ success, state: downloads.currentState });
  });

  app.post('/downloads/stop', async () => {
    downloads.stop();
    return { success: true, state: downloads.currentState };
  });

  app.post('/downloads/skip', async (request) => {
    const { slot } = skipSchema.parse(request.body ?? undefined);
    return { success: true, skipped: downloads.skipCurrent(slot) };
  });

  app.get('/downloads/progress', async () => downloads.getProgress());

  app.get('/downloads/queued', async () => downloads.getQueued());

  app.get('/downloads/deferred', async () => ({ links: downloads.getDeferredReview() }));

  app.post('/downloads/deferred/retry', async (request, reply) => {
    const { url } = retrySchema.parse(request.body);
    const result = downloads.retryDeferred(url);
    return reply.code(statusOf(result)).send(result);
  });

  // Decisions

  app.get('/decisions', async () => ({
    limits: limitPrompt.channel.pending(),
    authoring: authoring.channel.pending(),
  }));

  app.post('/decisions/limits/:id', async (request, reply) => {
    const { id } = decisionParamsSchema.parse(request.params);
    const { decision } = limitAnswerSchema.parse(request.body);
    if (!limitPrompt.channel.respond(id, decision)) {
      return reply.code(404).send({ success: false, message: 'Decision not found' });
    }
    return { success: true };
  });

  app.post('/decisions/authoring/:id', async (request, reply) => {
    const { id } = decisionParamsSchema.parse(request.params);
    const body = authoringAnswerSchema.parse(request.body);
    const answer: RuleAuthoringAnswer =
      body.action === 'create' ? { action: 'create', draft: body.draft } : { action: 'cancel' };
    if (!authoring.channel.respond(id, answer)) {
      return reply.code(404).send({ success: false, message: 'Decision not found' });
    }
    return { success: true };
  });

  // Ingestion

  app.post('/ingest/clipboard', async (request) => {
    const { text } = clipboardSchema.parse(request.body);
    return ingestion.ingestClipboard(text);
  });

  app.post('/ingest/file', async (request) => {
    const { path, force } = ingestFileSchema.parse(request.body);
    return ingestion.ingestFile(path, { force });
  });

  app.post('/ingest/directory', async (request) => {
    const { dir } = ingestDirectorySchema.parse(request.body ?? undefined);
    return { results: await ingestion.ingestDirectory(dir) };
  });

  app.get('/ingest/halted', async () => ({ batches: ingestion.haltedBatches() }));

  return app;
}
