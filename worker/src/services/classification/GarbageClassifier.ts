import { logger } from '../../utils/logger';
import { describeError, ResponseFormatError } from '../../utils/errors';
import type { JsonChatProvider } from '../llm/MistralClient';
import { GarbageVerdictSchema, type GarbageVerdict } from '@retitler/shared/schemas/paperless.zod';

const DEFAULT_PREVIEW_LENGTH = 2000;

export interface GarbageClassifierOptions {
  prompt: string;
  previewLength?: number;
  maxTokens?: number;
}

export function parseVerdict(responseContent: string): GarbageVerdict {
  let raw: unknown;
  try {
    raw = JSON.parse(responseContent);
  } catch {
    throw new ResponseFormatError('Verification response is not valid JSON');
  }

  const parsed = GarbageVerdictSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ResponseFormatError(`Verification response lacks is_garbage: ${describeError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Asks the chat model whether OCR output is readable text or noise.
 */
export class GarbageClassifier {
  private readonly previewLength: number;

  constructor(
    private readonly llm: JsonChatProvider,
    private readonly options: GarbageClassifierOptions
  ) {
    this.previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
  }

  /**
   * `true` for garbage, `false` for readable text, `null` when no verdict
   * could be obtained. A missing verdict is never read as "not garbage".
   */
  async isGarbage(text: string): Promise<boolean | null> {
    const response = await this.llm.completeJson(
      [
        { role: 'system', content: this.options.prompt },
        { role: 'user', content: text.substring(0, this.previewLength) },
      ],
      { maxTokens: this.options.maxTokens }
    );
    if (response === null) {
      logger.error('No verification verdict received');
      return null;
    }

    try {
      return parseVerdict(response).is_garbage;
    } catch (error) {
      logger.error(`${describeError(error)}: ${response}`);
      return null;
    }
  }
}
