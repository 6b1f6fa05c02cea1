import { createWriteStream } from 'fs';
import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { HttpClient, type QueryParams } from '../../http/HttpClient';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import type { DocumentStore, SimilarDocument } from '../../models/Document';
import {
  CustomFieldSchema,
  DocumentSchema,
  SearchHitSchema,
  pageSchema,
  type CustomField,
  type CustomFieldInstance,
  type Document,
} from '@retitler/shared/schemas/paperless.zod';

const DOCUMENTS_ENDPOINT = '/api/documents/';
const CUSTOM_FIELDS_ENDPOINT = '/api/custom_fields/';
const DEFAULT_SIMILAR_LIMIT = 5;
const PROCESSED_FIELD_DATA_TYPE = 'integer';
const DEFAULT_DOWNLOAD_EXTENSION = '.pdf';

const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  'application/pdf': '.pdf',
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/tiff': '.tif',
};

const DocumentPageSchema = pageSchema(DocumentSchema);
const CustomFieldPageSchema = pageSchema(CustomFieldSchema);
const SearchPageSchema = pageSchema(SearchHitSchema);
const CreatedFieldSchema = z.object({ id: z.number().int().positive() });

interface Page<T> {
  count: number;
  next?: string | null;
  results: T[];
}

export interface PaperlessClientOptions {
  baseUrl: string;
  http: HttpClient;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function extensionFor(contentType: string | null): string {
  const mime = contentType?.split(';')[0].trim().toLowerCase() ?? '';
  return EXTENSION_BY_CONTENT_TYPE[mime] ?? DEFAULT_DOWNLOAD_EXTENSION;
}

export function buildAuthHeaders(apiKey: string): Record<string, string> {
  return { Authorization: `Token ${apiKey}` };
}

/**
 * paperless-ngx REST adapter. Follows the store's `next` cursors, streams
 * downloads to disk, and reports write failures as `false` rather than
 * throwing.
 */
export class PaperlessClient implements DocumentStore {
  private readonly baseUrl: string;
  private readonly http: HttpClient;

  constructor(options: PaperlessClientOptions) {
    this.baseUrl = trimTrailingSlash(options.baseUrl);
    this.http = options.http;
  }

  async listDocuments(filter?: string): Promise<Document[]> {
    let url = this.url(DOCUMENTS_ENDPOINT);
    if (filter) {
      url += `?${filter.replace(/^\?/, '')}`;
    }

    const documents = await this.collectPages(url, DocumentPageSchema, 'documents');
    return documents ?? [];
  }

  async getDocument(id: number): Promise<Document | null> {
    const response = await this.http.request('GET', this.documentUrl(id));
    if (response === null) {
      logger.error(`could not retrieve document info for document ${id}`);
      return null;
    }

    const parsed = DocumentSchema.safeParse(response);
    if (!parsed.success) {
      logger.error(`unexpected document payload for document ${id}: ${describeError(parsed.error)}`);
      return null;
    }
    return parsed.data;
  }

  async downloadDocument(id: number, directory: string): Promise<string | null> {
    logger.info(`Downloading document ${id}`);

    let target: string | null = null;
    try {
      const response = await this.http.stream('GET', this.url(`${DOCUMENTS_ENDPOINT}${id}/download/`));
      if (!response || !response.body) {
        logger.error(`Could not download document ${id} - no response body`);
        return null;
      }

      await mkdir(directory, { recursive: true });
      target = path.join(directory, `document_${id}${extensionFor(response.headers.get('content-type'))}`);

      await pipeline(Readable.fromWeb(response.body), createWriteStream(target));

      logger.info(`Document downloaded to ${target}`);
      return target;
    } catch (error) {
      logger.error(`Error downloading document ${id}: ${describeError(error)}`);
      if (target) {
        await rm(target, { force: true }).catch((cleanupError: unknown) => {
          logger.warn(`Failed to remove partial download ${target}: ${describeError(cleanupError)}`);
        });
      }
      return null;
    }
  }

  async patchTitle(id: number, title: string): Promise<boolean> {
    const ok = await this.patchDocument(id, { title });
    if (ok) {
      logger.info(`updated document ${id} title to ${title}`);
    } else {
      logger.error(`could not update document ${id} title to ${title}`);
    }
    return ok;
  }

  async patchContent(id: number, content: string): Promise<boolean> {
    const ok = await this.patchDocument(id, { content });
    if (ok) {
      logger.info(`updated document ${id} content`);
    } else {
      logger.error(`could not update document ${id} content`);
    }
    return ok;
  }

  async patchCustomFields(id: number, fields: CustomFieldInstance[]): Promise<boolean> {
    const ok = await this.patchDocument(id, { custom_fields: fields });
    if (!ok) {
      logger.error(`could not update custom fields of document ${id}`);
    }
    return ok;
  }

  async findSimilar(id: number, limit: number = DEFAULT_SIMILAR_LIMIT): Promise<SimilarDocument[]> {
    const params: QueryParams = { more_like_id: id, ordering: '-score', page_size: limit };
    const response = await this.http.request('GET', this.url(DOCUMENTS_ENDPOINT), { params });
    const parsed = SearchPageSchema.safeParse(response);
    if (response === null || !parsed.success) {
      logger.error('Could not retrieve similar documents');
      return [];
    }

    return parsed.data.results
      .filter((hit) => hit.id !== id)
      .map((hit) => ({
        id: hit.id,
        title: hit.title,
        score: hit.__search_hit__?.score ?? hit.score ?? 0,
      }));
  }

  async listCustomFields(): Promise<CustomField[] | null> {
    return this.collectPages(this.url(CUSTOM_FIELDS_ENDPOINT), CustomFieldPageSchema, 'custom fields');
  }

  async createCustomField(name: string): Promise<number | null> {
    const response = await this.http.request('POST', this.url(CUSTOM_FIELDS_ENDPOINT), {
      body: { name, data_type: PROCESSED_FIELD_DATA_TYPE, required: false },
    });
    const parsed = CreatedFieldSchema.safeParse(response);
    if (!parsed.success) {
      logger.error(`Could not create custom field ${name}`);
      return null;
    }

    logger.info(`Created custom field ${name} with ID ${parsed.data.id}`);
    return parsed.data.id;
  }

  /**
   * Walks the `next` cursors starting at `firstUrl`. `null` when the first
   * page fails; when a later page fails the items gathered so far are
   * returned and the gap is logged.
   */
  private async collectPages<T>(
    firstUrl: string,
    schema: z.ZodType<Page<T>, z.ZodTypeDef, unknown>,
    label: string
  ): Promise<T[] | null> {
    const first = schema.safeParse(await this.http.request('GET', firstUrl));
    if (!first.success) {
      logger.error(`could not retrieve ${label}`);
      return null;
    }

    const items = [...first.data.results];
    const total = first.data.count;
    logger.info(`Found ${total} total ${label}, retrieving all pages`);

    let next = first.data.next;
    let page = 1;
    while (next) {
      page++;
      logger.info(`Retrieving page ${page}`);
      const parsed = schema.safeParse(await this.http.request('GET', next));
      if (!parsed.success) {
        logger.error(`could not retrieve page ${page} of ${label}; continuing with ${items.length}/${total}`);
        break;
      }

      items.push(...parsed.data.results);
      logger.info(`Retrieved ${items.length}/${total} ${label}`);
      next = parsed.data.next;
    }

    return items;
  }

  private async patchDocument(id: number, body: Record<string, unknown>): Promise<boolean> {
    const response = await this.http.request('PATCH', this.documentUrl(id), { body });
    return response !== null;
  }

  private documentUrl(id: number): string {
    return this.url(`${DOCUMENTS_ENDPOINT}${id}/`);
  }

  private url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }
}
