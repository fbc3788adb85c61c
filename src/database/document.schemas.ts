import { z } from 'zod';
import { FILTER_ACTIONS, MATCH_MODES } from '../utils/filters/filter.types.js';
import { rulePositionSchema } from '../utils/validators/filter.schemas.js';
import { BATCH_STATUSES, LINK_SOURCES, LINK_STATUSES } from './database.types.js';

export const DOCUMENT_VERSION = 1;

const timestamp = z.string().datetime({ message: 'Expected an ISO-8601 timestamp' });

export const linkRecordSchema = z.object({
  url: z.string().min(1),
  status: z.enum(LINK_STATUSES),
  filter_matched_id: z.number().int().positive().nullable(),
  deleted: z.boolean(),
  limit_reason: z.string().nullable(),
  created_at: timestamp,
  updated_at: timestamp,
  source: z.enum(LINK_SOURCES).default('manual'),
  source_file: z.string().nullable().default(null),
  retry_count: z.number().int().min(0).default(0),
  last_error: z.string().nullable().default(null),
});

export const linksDocumentSchema = z.object({
  version: z.literal(DOCUMENT_VERSION),
  links: z.array(linkRecordSchema),
});

export const filterRecordSchema = z.object({
  numeric_id: z.number().int().positive(),
  name: z.string().min(1),
  rules: z.array(
    z.object({
      position: rulePositionSchema,
      mode: z.enum(MATCH_MODES),
      expression: z.string(),
    })
  ),
  action: z.enum(FILTER_ACTIONS),
  priority_rank: z.number().int().min(0),
  enabled: z.boolean().default(true),
});

export const filtersDocumentSchema = z
  .object({
    version: z.literal(DOCUMENT_VERSION),
    next_numeric_id: z.number().int().positive(),
    filters: z.array(filterRecordSchema),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<number>();
    for (const filter of document.filters) {
      if (seen.has(filter.numeric_id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate filter id ${filter.numeric_id}` });
      }
      if (filter.numeric_id >= document.next_numeric_id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Filter id ${filter.numeric_id} is not below next_numeric_id ${document.next_numeric_id}`,
        });
      }
      seen.add(filter.numeric_id);
    }
  });

export const batchRecordSchema = z.object({
  path: z.string().min(1),
  status: z.enum(BATCH_STATUSES),
  processed_at: timestamp.nullable(),
  halted_at: timestamp.nullable(),
  resume_index: z.number().int().min(0),
  links_found: z.number().int().min(0),
  error: z.string().nullable(),
});

export const batchesDocumentSchema = z.object({
  version: z.literal(DOCUMENT_VERSION),
  batches: z.array(batchRecordSchema),
});

export type LinkRecord = z.infer<typeof linkRecordSchema>;
export type LinksDocument = z.infer<typeof linksDocumentSchema>;
export type FilterRecord = z.infer<typeof filterRecordSchema>;
export type FiltersDocument = z.infer<typeof filtersDocumentSchema>;
export type BatchRecord = z.infer<typeof batchRecordSchema>;
export type BatchesDocument = z.infer<typeof batchesDocumentSchema>;
