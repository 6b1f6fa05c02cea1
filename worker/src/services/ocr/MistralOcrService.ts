import { access, readFile } from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger';
import { describeError, OcrError } from '../../utils/errors';
import type { MistralClient, OcrDocumentInput, OcrPage } from '../llm/MistralClient';

const PDF_EXTENSION = '.pdf';
const DEFAULT_IMAGE_FORMAT = 'jpeg';
const PAGE_SEPARATOR = '\n\n';

const IMAGE_FORMAT_BY_EXTENSION: Record<string, string> = {
  '.png': 'png',
  '.gif': 'gif',
};

export interface OcrProvider {
  /** Text of every page, or throws an OcrError. */
  recognize(filePath: string): Promise<string>;
}

export type MistralOcrApi = Pick<MistralClient, 'uploadFile' | 'getSignedUrl' | 'deleteFile' | 'processOcr'>;

export function imageMimeType(filePath: string): string {
  const format = IMAGE_FORMAT_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? DEFAULT_IMAGE_FORMAT;
  return `image/${format}`;
}

export function joinPages(pages: OcrPage[]): string {
  return pages
    .map((page) => page.markdown)
    .join(PAGE_SEPARATOR)
    .trim();
}

export class MistralOcrService implements OcrProvider {
  constructor(
    private readonly api: MistralOcrApi,
    private readonly model: string
  ) {}

  async recognize(filePath: string): Promise<string> {
    try {
      await access(filePath);
    } catch {
      throw new OcrError(`File not found: ${filePath}`, filePath);
    }

    const startTime = Date.now();
    const pages = filePath.toLowerCase().endsWith(PDF_EXTENSION)
      ? await this.recognizePdf(filePath)
      : await this.recognizeImage(filePath);

    const text = joinPages(pages);
    logger.info(`OCR completed for ${path.basename(filePath)}: ${pages.length} pages in ${Date.now() - startTime}ms`);

    if (text.length === 0) {
      throw new OcrError(`OCR returned no text for ${filePath}`, filePath);
    }
    return text;
  }

  private async recognizePdf(filePath: string): Promise<OcrPage[]> {
    const fileId = await this.api.uploadFile(filePath);
    if (!fileId) {
      throw new OcrError(`Upload of ${filePath} to the OCR provider failed`, filePath);
    }

    try {
      const signedUrl = await this.api.getSignedUrl(fileId);
      if (!signedUrl) {
        throw new OcrError(`No signed URL for uploaded file ${fileId}`, filePath);
      }
      return await this.process(filePath, { type: 'document_url', document_url: signedUrl });
    } finally {
      await this.deleteUploaded(fileId);
    }
  }

  private async recognizeImage(filePath: string): Promise<OcrPage[]> {
    logger.warn(`Performing OCR on image file ${filePath} (this is less tested and probably more error prone)`);

    const base64Image = (await readFile(filePath)).toString('base64');
    return this.process(filePath, {
      type: 'image_url',
      image_url: `data:${imageMimeType(filePath)};base64,${base64Image}`,
    });
  }

  private async process(filePath: string, document: OcrDocumentInput): Promise<OcrPage[]> {
    const pages = await this.api.processOcr(this.model, document);
    if (!pages) {
      throw new OcrError(`OCR request failed for ${filePath}`, filePath);
    }
    return pages;
  }

  private async deleteUploaded(fileId: string): Promise<void> {
    try {
      const deleted = await this.api.deleteFile(fileId);
      if (deleted) {
        logger.debug(`Deleted temporary Mistral file: ${fileId}`);
      } else {
        logger.warn(`Failed to delete temporary Mistral file ${fileId}`);
      }
    } catch (error) {
      logger.warn(`Failed to delete temporary Mistral file ${fileId}: ${describeError(error)}`);
    }
  }
}
