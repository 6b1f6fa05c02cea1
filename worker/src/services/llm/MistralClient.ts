import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { HttpClient } from '../../http/HttpClient';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';

const DEFAULT_BASE_URL = 'https://api.mistral.ai';
const CHAT_ENDPOINT = '/v1/chat/completions';
const FILES_ENDPOINT = '/v1/files';
const OCR_ENDPOINT = '/v1/ocr';
const SIGNED_URL_EXPIRY_HOURS = 24;
const OCR_FILE_PURPOSE = 'ocr';
const RESPONSE_FORMAT_JSON = 'json_object';
const LARGE_PROMPT_THRESHOLD = 10000;

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
}

/** A chat model constrained to answer with a JSON object. */
export interface JsonChatProvider {
  /** The raw JSON text of the first choice, or `null` when no answer was obtained. */
  completeJson(messages: ChatMessage[], options?: ChatOptions): Promise<string | null>;
}

export type OcrDocumentInput =
  | { type: 'document_url'; document_url: string }
  | { type: 'image_url'; image_url: string };

const ContentChunkSchema = z.object({ type: z.string(), text: z.string().optional() });

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.union([z.string(), z.array(ContentChunkSchema)]).nullish(),
      }),
    })
  ),
});

const UploadedFileSchema = z.object({ id: z.string().min(1) });

const SignedUrlSchema = z.object({ url: z.string().url() });

export const OcrPageSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  markdown: z.string(),
});

const OcrResponseSchema = z.object({ pages: z.array(OcrPageSchema) });

export type OcrPage = z.infer<typeof OcrPageSchema>;

export interface MistralClientOptions {
  baseUrl?: string;
  model: string;
  http: HttpClient;
}

export function buildBearerHeaders(apiKey: string): Record<string, string> {
  return { Authorization: `Bearer ${apiKey}` };
}

function flattenContent(content: string | Array<z.infer<typeof ContentChunkSchema>> | null | undefined): string {
  if (!content) {
    return '';
  }
  if (typeof content === 'string') {
    return content;
  }
  return content.map((chunk) => chunk.text ?? '').join('');
}

/**
 * Thin REST client for the Mistral API: JSON-mode chat completions and the
 * file upload / signed URL / OCR endpoints. Transport retries come from the
 * injected HttpClient; every method resolves to `null` (or `false`) when the
 * call did not produce a usable answer.
 */
export class MistralClient implements JsonChatProvider {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly http: HttpClient;

  constructor(options: MistralClientOptions) {
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model = options.model;
    this.http = options.http;
  }

  async completeJson(messages: ChatMessage[], options: ChatOptions = {}): Promise<string | null> {
    const promptSize = messages.reduce((total, message) => total + message.content.length, 0);
    if (promptSize > LARGE_PROMPT_THRESHOLD) {
      logger.warn(`Large prompt size (${promptSize} chars). This may cause slower inference.`);
    }

    const response = await this.http.request('POST', this.url(CHAT_ENDPOINT), {
      body: {
        model: this.model,
        messages,
        response_format: { type: RESPONSE_FORMAT_JSON },
        ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
      },
    });
    if (response === null) {
      logger.error('No response from Mistral');
      return null;
    }

    const parsed = ChatCompletionResponseSchema.safeParse(response);
    if (!parsed.success || parsed.data.choices.length === 0) {
      logger.error('Mistral returned no choices');
      return null;
    }

    const content = flattenContent(parsed.data.choices[0].message.content);
    if (content.trim().length === 0) {
      logger.error('Mistral returned an empty message');
      return null;
    }
    return content;
  }

  async uploadFile(filePath: string): Promise<string | null> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      logger.error(`Could not read ${filePath} for upload: ${describeError(error)}`);
      return null;
    }

    const form = new FormData();
    form.append('purpose', OCR_FILE_PURPOSE);
    form.append('file', new Blob([data]), path.basename(filePath));

    const parsed = UploadedFileSchema.safeParse(
      await this.http.request('POST', this.url(FILES_ENDPOINT), { form })
    );
    if (!parsed.success) {
      logger.error(`Could not upload ${filePath} to Mistral`);
      return null;
    }
    return parsed.data.id;
  }

  async getSignedUrl(fileId: string): Promise<string | null> {
    const parsed = SignedUrlSchema.safeParse(
      await this.http.request('GET', this.url(`${FILES_ENDPOINT}/${fileId}/url`), {
        params: { expiry: SIGNED_URL_EXPIRY_HOURS },
      })
    );
    if (!parsed.success) {
      logger.error(`Could not get a signed URL for Mistral file ${fileId}`);
      return null;
    }
    return parsed.data.url;
  }

  async deleteFile(fileId: string): Promise<boolean> {
    const response = await this.http.request('DELETE', this.url(`${FILES_ENDPOINT}/${fileId}`));
    return response !== null;
  }

  async processOcr(model: string, document: OcrDocumentInput): Promise<OcrPage[] | null> {
    const response = await this.http.request('POST', this.url(OCR_ENDPOINT), {
      body: { model, document },
    });
    if (response === null) {
      return null;
    }

    const parsed = OcrResponseSchema.safeParse(response);
    if (!parsed.success) {
      logger.error(`Unexpected OCR response: ${describeError(parsed.error)}`);
      return null;
    }
    return parsed.data.pages;
  }

  private url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }
}
