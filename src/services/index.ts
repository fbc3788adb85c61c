export {
  ClassifierService,
  type ClassificationResult,
  type ClassifierOptions,
  type LinkOrigin,
  type ProcessOutcome,
  type ReprocessSummary,
  type RuleAuthoring,
  type RuleAuthoringAnswer,
  type RuleAuthoringRequest,
} from './classifier.service.js';
export {
  FilterService,
  type FilterDeleteResult,
  type FilterListResult,
  type FilterManagementResult,
  type FilterOrderResult,
  type LinkStatusResult,
} from './filter.service.js';
export {
  CLIPBOARD_PREFIX,
  IngestionService,
  type IngestFileOptions,
  type IngestionResult,
} from './ingestion.service.js';
export { FileSystemInputReader, type InputReader } from './input-reader.js';
export { ChannelRuleAuthoring } from './rule-authoring.js';
