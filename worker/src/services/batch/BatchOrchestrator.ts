import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { sleep as defaultSleep, type Sleeper } from '../../utils/backoff';
import type { DocumentStore } from '../../models/Document';
import {
  failed,
  skipped,
  TRACKING_DISABLED,
  type ProcessingOutcome,
  type TrackingContext,
} from '../../models/ProcessingOutcome';
import type { ContentPipeline } from '../pipeline/ContentPipeline';
import type { ProcessedFieldTracker } from '../paperless/ProcessedFieldTracker';
import type { ScratchDirectory } from './ScratchDirectory';
import type { Document } from '@retitler/shared/schemas/paperless.zod';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_PROGRESS_INTERVAL = 10;
const DEFAULT_SWEEP_INTERVAL = 20;

export interface TrackingSettings {
  enabled: boolean;
  fieldId: number;
  fieldName: string;
  reprocess: boolean;
}

export interface BatchSettings {
  tracking: TrackingSettings;
  dryRun: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
  progressInterval?: number;
  sweepInterval?: number;
}

export interface BatchDependencies {
  store: DocumentStore;
  tracker: ProcessedFieldTracker;
  pipeline: ContentPipeline;
  scratch: ScratchDirectory;
  sleep?: Sleeper;
}

export interface RunAllOptions {
  exclude?: number[];
  filter?: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Set when the run stopped before processing any document. */
  abortReason?: string;
}

function emptySummary(abortReason?: string): BatchSummary {
  return { total: 0, succeeded: 0, failed: 0, skipped: 0, abortReason };
}

export class BatchOrchestrator {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly progressInterval: number;
  private readonly sweepInterval: number;
  private readonly sleep: Sleeper;

  constructor(
    private readonly deps: BatchDependencies,
    private readonly settings: BatchSettings
  ) {
    this.maxRetries = Math.max(1, settings.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = settings.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.progressInterval = settings.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    this.sweepInterval = settings.sweepInterval ?? DEFAULT_SWEEP_INTERVAL;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async runSingle(documentId: number): Promise<ProcessingOutcome> {
    if (this.settings.dryRun) {
      logger.info('Running in dry mode');
    }
    logger.info(`Running for document ${documentId}`);

    try {
      await this.deps.scratch.prepare();
      const tracking = await this.resolveTracking();
      if (!tracking) {
        return failed('processed marker field unavailable');
      }
      return await this.attempt(documentId, tracking);
    } catch (error) {
      logger.error(`Error processing document ${documentId}: ${describeError(error)}`);
      return failed(describeError(error));
    } finally {
      await this.deps.scratch.dispose();
    }
  }

  async runAll(options: RunAllOptions = {}): Promise<BatchSummary> {
    if (this.settings.dryRun) {
      logger.info('Running in dryrun mode');
    }
    logger.info('Running on all documents');

    try {
      await this.deps.scratch.prepare();
      const tracking = await this.resolveTracking();
      if (!tracking) {
        return emptySummary('processed marker field unavailable');
      }

      const listed = await this.deps.store.listDocuments(options.filter);
      if (listed.length === 0) {
        logger.error('could not retrieve documents');
        return emptySummary('no documents retrieved');
      }
      logger.info(`found ${listed.length} documents`);

      const excluded = new Set(options.exclude ?? []);
      const documents = excluded.size > 0 ? listed.filter((doc) => !excluded.has(doc.id)) : listed;
      if (excluded.size > 0) {
        logger.info(`Filtered to ${documents.length} documents after exclusions`);
      }

      return await this.processAll(documents, tracking);
    } catch (error) {
      logger.error(`Error during batch processing: ${describeError(error)}`);
      return emptySummary(describeError(error));
    } finally {
      await this.deps.scratch.dispose();
    }
  }

  private async processAll(documents: Document[], tracking: TrackingContext): Promise<BatchSummary> {
    const summary = emptySummary();
    summary.total = documents.length;

    for (const [index, listed] of documents.entries()) {
      const position = index + 1;
      const outcome = await this.processListed(listed, tracking, position, documents.length);

      if (outcome.status === 'succeeded') {
        summary.succeeded++;
      } else if (outcome.status === 'skipped') {
        summary.skipped++;
      } else {
        summary.failed++;
      }

      if (position % this.progressInterval === 0 || position === documents.length) {
        logger.info(
          `Progress: ${position}/${documents.length} documents processed ` +
            `(${summary.succeeded} success, ${summary.failed} failed, ${summary.skipped} skipped)`
        );
      }

      if (position % this.sweepInterval === 0) {
        await this.deps.scratch.sweep();
      }
    }

    logger.info(`Completed processing ${documents.length} documents`);
    logger.info(`Results: ${summary.succeeded} successful, ${summary.failed} failed, ${summary.skipped} skipped`);
    return summary;
  }

  private async processListed(
    listed: Document,
    tracking: TrackingContext,
    position: number,
    total: number
  ): Promise<ProcessingOutcome> {
    // Same test as the pipeline's own gate, made here so skipped documents are never downloaded.
    if (this.deps.pipeline.shouldSkip(listed, tracking)) {
      logger.info(`Document ${listed.id} has already been processed, skipping (use --reprocess to force reprocessing)`);
      return skipped('already processed');
    }

    logger.info(`Processing document ${position}/${total} (ID: ${listed.id})`);

    let outcome: ProcessingOutcome = failed('not attempted');
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        outcome = await this.attempt(listed.id, tracking);
      } catch (error) {
        outcome = failed(describeError(error));
      }

      if (outcome.status !== 'failed') {
        return outcome;
      }

      logger.error(`Error processing document ${listed.id} (attempt ${attempt}/${this.maxRetries}): ${outcome.reason}`);
      if (attempt < this.maxRetries) {
        await this.sleep(this.retryDelayMs);
      }
    }

    logger.error(`Failed to process document ${listed.id} after ${this.maxRetries} attempts`);
    return outcome;
  }

  /** One pass over a document: fresh fetch, download when needed, pipeline, scratch cleanup. */
  private async attempt(documentId: number, tracking: TrackingContext): Promise<ProcessingOutcome> {
    const document = await this.deps.store.getDocument(documentId);
    if (!document) {
      return failed(`could not retrieve document ${documentId}`);
    }

    let sourcePath: string | null = null;
    try {
      if (this.deps.pipeline.needsSourceFile && !this.deps.pipeline.shouldSkip(document, tracking)) {
        sourcePath = await this.deps.store.downloadDocument(documentId, this.deps.scratch.directory);
        if (!sourcePath) {
          return failed(`could not download document ${documentId}`);
        }
      }

      return await this.deps.pipeline.process(document, sourcePath, tracking);
    } finally {
      if (sourcePath) {
        await this.deps.scratch.remove(sourcePath);
      }
    }
  }

  private async resolveTracking(): Promise<TrackingContext | null> {
    const { tracking } = this.settings;
    if (!tracking.enabled) {
      return TRACKING_DISABLED;
    }

    const fieldId = await this.deps.tracker.ensureField(tracking.fieldName, tracking.fieldId);
    if (fieldId === null) {
      logger.error(`Could not find or create custom field ${tracking.fieldName}; aborting`);
      return null;
    }
    if (fieldId !== tracking.fieldId) {
      logger.info(`Custom field ID mismatch, using ID ${fieldId} instead of configured ${tracking.fieldId}`);
    }

    return { enabled: true, fieldId, reprocess: tracking.reprocess };
  }
}
