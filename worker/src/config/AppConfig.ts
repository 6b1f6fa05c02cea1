import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { DEFAULT_TITLE_PROMPT, DEFAULT_VERIFICATION_PROMPT } from '../services/llm/prompts';
import {
  LogLevelEnum,
  OcrVerificationPolicyEnum,
  type LogLevel,
  type OcrVerificationPolicy,
} from '@retitler/shared/schemas/paperless.zod';

const TRUTHY_VALUES = new Set(['y', 'yes', 'on', '1', 'true', 't']);

export const DEFAULTS = {
  paperlessUrl: 'http://localhost:8000',
  mistralBaseUrl: 'https://api.mistral.ai',
  mistralModel: 'mistral-large-latest',
  mistralOcrModel: 'mistral-ocr-latest',
  timeoutSeconds: 10,
  llmTimeoutSeconds: 120,
  processedFieldId: 3,
  processedFieldName: 'mistral_processed',
  scratchDirName: 'temp_docs',
} as const;

export function strtobool(value: string): boolean {
  return TRUTHY_VALUES.has(value.trim().toLowerCase());
}

const BooleanSetting = z.union([z.boolean(), z.string()]).transform((value) =>
  typeof value === 'boolean' ? value : strtobool(value)
);

const Seconds = z.coerce.number().positive();

// Flat input as read from env and CLI; `loadConfig` groups it into sections.
export const ConfigInputSchema = z.object({
  paperlessUrl: z.string().url().default(DEFAULTS.paperlessUrl),
  paperlessApiKey: z.string({ required_error: 'PAPERLESS_API_KEY is required' }).min(1),
  mistralApiKey: z.string({ required_error: 'MISTRAL_API_KEY is required' }).min(1),
  mistralBaseUrl: z.string().url().default(DEFAULTS.mistralBaseUrl),
  mistralModel: z.string().min(1).default(DEFAULTS.mistralModel),
  mistralOcrModel: z.string().min(1).default(DEFAULTS.mistralOcrModel),
  mistralMaxTokens: z.coerce.number().int().positive().optional(),
  timeoutSeconds: Seconds.default(DEFAULTS.timeoutSeconds),
  llmTimeoutSeconds: Seconds.default(DEFAULTS.llmTimeoutSeconds),
  usePaperlessOcr: BooleanSetting.default(false),
  verifyOcr: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(OcrVerificationPolicyEnum)
    .default('after-ocr'),
  trackProcessed: BooleanSetting.default(true),
  processedFieldId: z.coerce.number().int().positive().default(DEFAULTS.processedFieldId),
  processedFieldName: z.string().min(1).default(DEFAULTS.processedFieldName),
  reprocess: BooleanSetting.default(false),
  titlePrompt: z.string().min(1).default(DEFAULT_TITLE_PROMPT),
  verificationPrompt: z.string().min(1).default(DEFAULT_VERIFICATION_PROMPT),
  dryRun: BooleanSetting.default(false),
  logLevel: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(LogLevelEnum)
    .default('INFO'),
  scratchDir: z.string().min(1).optional(),
  maskPii: BooleanSetting.default(true),
});

export type ConfigInput = z.input<typeof ConfigInputSchema>;
/** Env and CLI values arrive as strings; tests and callers may pass typed values. */
export type ConfigOverrides = { [K in keyof ConfigInput]?: ConfigInput[K] | string };

const ENV_NAMES: Record<keyof ConfigInput, string> = {
  paperlessUrl: 'PAPERLESS_URL',
  paperlessApiKey: 'PAPERLESS_API_KEY',
  mistralApiKey: 'MISTRAL_API_KEY',
  mistralBaseUrl: 'MISTRAL_BASEURL',
  mistralModel: 'MISTRAL_MODEL',
  mistralOcrModel: 'MISTRAL_OCR_MODEL',
  mistralMaxTokens: 'MISTRAL_MAX_TOKENS',
  timeoutSeconds: 'TIMEOUT',
  llmTimeoutSeconds: 'LLM_TIMEOUT',
  usePaperlessOcr: 'USE_PAPERLESS_OCR',
  verifyOcr: 'VERIFY_OCR',
  trackProcessed: 'TRACK_PROCESSED',
  processedFieldId: 'PROCESSED_FIELD_ID',
  processedFieldName: 'PROCESSED_FIELD_NAME',
  reprocess: 'REPROCESS_DOCUMENTS',
  titlePrompt: 'OVERRIDE_PROMPT',
  verificationPrompt: 'VERIFICATION_PROMPT',
  dryRun: 'DRY_RUN',
  logLevel: 'LOGLEVEL',
  scratchDir: 'SCRATCH_DIR',
  maskPii: 'MASK_PII',
};

export interface PaperlessSettings {
  url: string;
  apiKey: string;
  timeoutMs: number;
}

export interface MistralSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  ocrModel: string;
  maxTokens?: number;
  timeoutMs: number;
}

export interface ProcessingSettings {
  useStoreOcr: boolean;
  verification: OcrVerificationPolicy;
  dryRun: boolean;
  titlePrompt: string;
  verificationPrompt: string;
  scratchDir: string;
}

export interface TrackingConfig {
  enabled: boolean;
  fieldId: number;
  fieldName: string;
  reprocess: boolean;
}

export interface LoggingSettings {
  level: LogLevel;
  maskPii: boolean;
}

export interface AppConfig {
  readonly paperless: Readonly<PaperlessSettings>;
  readonly mistral: Readonly<MistralSettings>;
  readonly processing: Readonly<ProcessingSettings>;
  readonly tracking: Readonly<TrackingConfig>;
  readonly logging: Readonly<LoggingSettings>;
}

type Environment = Record<string, string | undefined>;

function readEnvironment(env: Environment): Record<string, string> {
  const input: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_NAMES)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      input[key] = value;
    }
  }
  return input;
}

function definedEntries(overrides: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Builds the run configuration from environment variables with CLI
 * overrides on top. Every invalid or missing setting is reported at once.
 */
export function loadConfig(env: Environment = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const parsed = ConfigInputSchema.safeParse({ ...readEnvironment(env), ...definedEntries(overrides) });
  if (!parsed.success) {
    throw ConfigError.fromZodError(parsed.error);
  }
  const input = parsed.data;

  return Object.freeze({
    paperless: Object.freeze({
      url: input.paperlessUrl.replace(/\/+$/, ''),
      apiKey: input.paperlessApiKey,
      timeoutMs: input.timeoutSeconds * 1000,
    }),
    mistral: Object.freeze({
      apiKey: input.mistralApiKey,
      baseUrl: input.mistralBaseUrl.replace(/\/+$/, ''),
      model: input.mistralModel,
      ocrModel: input.mistralOcrModel,
      maxTokens: input.mistralMaxTokens,
      timeoutMs: input.llmTimeoutSeconds * 1000,
    }),
    processing: Object.freeze({
      useStoreOcr: input.usePaperlessOcr,
      verification: input.verifyOcr,
      dryRun: input.dryRun,
      titlePrompt: input.titlePrompt,
      verificationPrompt: input.verificationPrompt,
      scratchDir: path.resolve(input.scratchDir ?? path.join(process.cwd(), DEFAULTS.scratchDirName)),
    }),
    tracking: Object.freeze({
      enabled: input.trackProcessed,
      fieldId: input.processedFieldId,
      fieldName: input.processedFieldName,
      reprocess: input.reprocess,
    }),
    logging: Object.freeze({
      level: input.logLevel,
      maskPii: input.maskPii,
    }),
  });
}
