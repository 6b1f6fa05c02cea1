import { z } from 'zod';

// ============================================================
// Enums
// ============================================================

export const ProcessingStatusEnum = z.enum(['succeeded', 'skipped', 'failed']);

export const OcrVerificationPolicyEnum = z.enum(['off', 'after-ocr', 'always']);

export const LogLevelEnum = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']);

// ============================================================
// Document store (paperless-ngx REST API)
// ============================================================

export const CustomFieldInstanceSchema = z.object({
  field: z.number().int(),
  value: z.unknown(),
});

export const DocumentSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  content: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  custom_fields: z.array(CustomFieldInstanceSchema).default([]),
});

export const CustomFieldSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  data_type: z.string().optional(),
});

export const SearchHitSchema = z.object({
  id: z.number().int(),
  title: z.string().default(''),
  score: z.number().optional(),
  __search_hit__: z
    .object({
      score: z.number().nullish(),
    })
    .nullish(),
});

export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    count: z.number().int().nonnegative().default(0),
    next: z.string().nullish(),
    results: z.array(item).default([]),
  });
}

// ============================================================
// LLM response envelopes
// ============================================================

export const TitleResponseSchema = z.object({
  title: z.string().trim().min(1),
  // Only ever logged, so any value (or none) is accepted.
  explanation: z
    .unknown()
    .transform((value) => (value === undefined || value === null ? '' : typeof value === 'string' ? value : JSON.stringify(value))),
});

export const GarbageVerdictSchema = z.object({
  is_garbage: z.boolean(),
});

// ============================================================
// Types
// ============================================================

export type ProcessingStatus = z.infer<typeof ProcessingStatusEnum>;
export type OcrVerificationPolicy = z.infer<typeof OcrVerificationPolicyEnum>;
export type LogLevel = z.infer<typeof LogLevelEnum>;
export type CustomFieldInstance = z.infer<typeof CustomFieldInstanceSchema>;
export type Document = z.infer<typeof DocumentSchema>;
export type CustomField = z.infer<typeof CustomFieldSchema>;
export type SearchHit = z.infer<typeof SearchHitSchema>;
export type TitleResponse = z.infer<typeof TitleResponseSchema>;
export type GarbageVerdict = z.infer<typeof GarbageVerdictSchema>;
