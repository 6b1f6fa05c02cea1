import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import type { DocumentStore, SimilarDocument } from '../../models/Document';
import {
  failed,
  skipped,
  succeeded,
  type ProcessingOutcome,
  type TrackingContext,
} from '../../models/ProcessingOutcome';
import type { ProcessedFieldTracker } from '../paperless/ProcessedFieldTracker';
import type { OcrProvider } from '../ocr/MistralOcrService';
import type { GarbageClassifier } from '../classification/GarbageClassifier';
import type { TitleGenerator } from '../titling/TitleGenerator';
import type { Document, OcrVerificationPolicy } from '@retitler/shared/schemas/paperless.zod';

const DEFAULT_SIMILAR_LIMIT = 5;

export interface PipelineSettings {
  /** Keep the store's own OCR text instead of re-running OCR on the source file. */
  useStoreOcr: boolean;
  verification: OcrVerificationPolicy;
  dryRun: boolean;
  similarLimit?: number;
}

export interface PipelineDependencies {
  store: DocumentStore;
  tracker: ProcessedFieldTracker;
  ocr: OcrProvider;
  classifier: GarbageClassifier;
  titles: TitleGenerator;
}

/**
 * Per-document flow: skip gate, OCR, garbage check, similar-document
 * lookup, title generation, write-back, processed marker. Every gate can
 * end the flow early with a `skipped` or `failed` outcome.
 *
 * An OCR failure fails the document; the store's older text is never used
 * as a stand-in.
 */
export class ContentPipeline {
  private readonly similarLimit: number;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly settings: PipelineSettings
  ) {
    this.similarLimit = settings.similarLimit ?? DEFAULT_SIMILAR_LIMIT;
  }

  /** Whether `process` will look at a downloaded source file. */
  get needsSourceFile(): boolean {
    return !this.settings.useStoreOcr;
  }

  shouldSkip(document: Document, tracking: TrackingContext): boolean {
    return tracking.enabled && !tracking.reprocess && this.deps.tracker.isProcessed(document, tracking.fieldId);
  }

  async process(
    document: Document,
    sourcePath: string | null,
    tracking: TrackingContext
  ): Promise<ProcessingOutcome> {
    const id = document.id;

    if (this.shouldSkip(document, tracking)) {
      logger.info(`Document ${id} has already been processed, skipping (use --reprocess to force reprocessing)`);
      return skipped('already processed');
    }

    let content = document.content;
    let ocrText: string | null = null;

    if (this.needsSourceFile && sourcePath) {
      try {
        ocrText = await this.deps.ocr.recognize(sourcePath);
      } catch (error) {
        logger.error(`Failed to perform OCR on document ${id}: ${describeError(error)}`);
        return failed(`ocr failed: ${describeError(error)}`);
      }
      content = ocrText;
    }

    if (this.shouldVerify(ocrText !== null)) {
      const garbage = await this.deps.classifier.isGarbage(content);
      if (garbage === null) {
        return failed('could not verify ocr text');
      }
      if (garbage) {
        logger.warn(`Text of document ${id} was judged garbage; leaving content and title unchanged`);
        await this.markProcessed(id, tracking);
        return skipped('content judged garbage');
      }
    }

    if (content.trim().length === 0) {
      logger.error(`Document ${id} has no text content`);
      return failed('no text content');
    }

    const similar = await this.findSimilar(id);

    const generated = await this.deps.titles.generate(content, similar);
    if (!generated) {
      logger.error(`could not generate title for document ${id}`);
      return failed('title generation failed');
    }
    logger.info(
      `will update document ${id} title from ${document.title} to: ${generated.title} because ${generated.explanation}`
    );

    if (this.settings.dryRun) {
      if (ocrText !== null) {
        logger.info(`would update document ${id} content to: \n\n${ocrText}`);
      }
      logger.info(`would update document ${id} title to: ${generated.title}`);
      return succeeded('dry run', generated.title);
    }

    if (ocrText !== null && !(await this.deps.store.patchContent(id, ocrText))) {
      return failed('content update failed');
    }
    if (!(await this.deps.store.patchTitle(id, generated.title))) {
      return failed('title update failed');
    }

    await this.markProcessed(id, tracking);
    return succeeded('title updated', generated.title);
  }

  private shouldVerify(ocrPerformed: boolean): boolean {
    switch (this.settings.verification) {
      case 'always':
        return true;
      case 'after-ocr':
        return ocrPerformed;
      case 'off':
        return false;
    }
  }

  private async findSimilar(id: number): Promise<SimilarDocument[]> {
    const similar = await this.deps.store.findSimilar(id, this.similarLimit);
    if (similar.length > 0) {
      logger.info(
        `Found ${similar.length} similar documents to help with title generation: ${similar.map((doc) => doc.title).join(', ')}`
      );
    } else {
      logger.info(`No similar documents found for document ${id}`);
    }
    return similar;
  }

  private async markProcessed(id: number, tracking: TrackingContext): Promise<void> {
    if (!tracking.enabled || this.settings.dryRun) {
      return;
    }
    const ok = await this.deps.tracker.markProcessed(id, tracking.fieldId);
    if (!ok) {
      logger.warn(`Document ${id} was processed but could not be marked; it will be processed again next run`);
    }
  }
}
