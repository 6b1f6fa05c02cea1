import { logger } from '../../utils/logger';
import { describeError, ResponseFormatError } from '../../utils/errors';
import type { JsonChatProvider } from '../llm/MistralClient';
import type { SimilarDocument } from '../../models/Document';
import { normalizeTitle, titleProblems } from './titleRules';
import { TitleResponseSchema, type TitleResponse } from '@retitler/shared/schemas/paperless.zod';

const DEFAULT_PREVIEW_LENGTH = 4000;

export interface GeneratedTitle {
  title: string;
  explanation: string;
  /** What the model answered before normalization. */
  rawTitle: string;
}

export interface TitleGeneratorOptions {
  prompt: string;
  previewLength?: number;
  maxTokens?: number;
  clock?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatPromptDate(date: Date): string {
  return `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${date.getFullYear()}`;
}

export function parseTitleResponse(responseContent: string): TitleResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(responseContent);
  } catch {
    throw new ResponseFormatError('Title response is not valid JSON');
  }

  const parsed = TitleResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ResponseFormatError(`Title response has an unexpected shape: ${describeError(parsed.error)}`);
  }
  return parsed.data;
}

export class TitleGenerator {
  private readonly previewLength: number;
  private readonly clock: () => Date;

  constructor(
    private readonly llm: JsonChatProvider,
    private readonly options: TitleGeneratorOptions
  ) {
    this.previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
    this.clock = options.clock ?? (() => new Date());
  }

  buildContext(content: string, similar: SimilarDocument[] = []): string {
    let context = `${formatPromptDate(this.clock())} ${content.substring(0, this.previewLength)}`;

    if (similar.length > 0) {
      context += '\nTitles of similar documents:\n' + similar.map((doc) => `- ${doc.title}`).join('\n');
    }

    return context;
  }

  /**
   * Resolves to `null` when the model gave no answer, answered with
   * something other than the `{title, explanation}` object, or proposed a
   * title that is empty once normalized.
   */
  async generate(content: string, similar: SimilarDocument[] = []): Promise<GeneratedTitle | null> {
    const response = await this.llm.completeJson(
      [
        { role: 'system', content: this.options.prompt },
        { role: 'user', content: this.buildContext(content, similar) },
      ],
      { maxTokens: this.options.maxTokens }
    );
    if (response === null) {
      return null;
    }

    let parsed: TitleResponse;
    try {
      parsed = parseTitleResponse(response);
    } catch (error) {
      logger.error(`${describeError(error)}: ${response}`);
      return null;
    }

    const problems = titleProblems(parsed.title);
    const title = problems.length > 0 ? normalizeTitle(parsed.title) : parsed.title;
    if (problems.length > 0) {
      logger.warn(`Proposed title "${parsed.title}" ${problems.join(', ')}; using "${title}"`);
    }
    if (title.length === 0) {
      logger.error(`Proposed title "${parsed.title}" is empty after normalization`);
      return null;
    }

    return { title, explanation: parsed.explanation, rawTitle: parsed.title };
  }
}
