import { HttpClient, type FetchLike } from './http/HttpClient';
import { PaperlessClient, buildAuthHeaders } from './services/paperless/PaperlessClient';
import { ProcessedFieldTracker } from './services/paperless/ProcessedFieldTracker';
import { MistralClient, buildBearerHeaders } from './services/llm/MistralClient';
import { MistralOcrService } from './services/ocr/MistralOcrService';
import { GarbageClassifier } from './services/classification/GarbageClassifier';
import { TitleGenerator } from './services/titling/TitleGenerator';
import { ContentPipeline } from './services/pipeline/ContentPipeline';
import { BatchOrchestrator } from './services/batch/BatchOrchestrator';
import { ScratchDirectory } from './services/batch/ScratchDirectory';
import { logger } from './utils/logger';
import type { AppConfig } from './config/AppConfig';
import type { Sleeper } from './utils/backoff';

export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 1;

export interface AppRuntime {
  fetchImpl?: FetchLike;
  sleep?: Sleeper;
}

export type RunRequest =
  | { kind: 'single'; documentId: number }
  | { kind: 'all'; exclude: number[]; filter?: string };

export function createApp(config: AppConfig, runtime: AppRuntime = {}): BatchOrchestrator {
  const paperlessHttp = new HttpClient({
    headers: buildAuthHeaders(config.paperless.apiKey),
    timeoutMs: config.paperless.timeoutMs,
    fetchImpl: runtime.fetchImpl,
    sleep: runtime.sleep,
  });
  const mistralHttp = new HttpClient({
    headers: buildBearerHeaders(config.mistral.apiKey),
    timeoutMs: config.mistral.timeoutMs,
    fetchImpl: runtime.fetchImpl,
    sleep: runtime.sleep,
  });

  const store = new PaperlessClient({ baseUrl: config.paperless.url, http: paperlessHttp });
  const mistral = new MistralClient({
    baseUrl: config.mistral.baseUrl,
    model: config.mistral.model,
    http: mistralHttp,
  });
  const tracker = new ProcessedFieldTracker(store);

  const pipeline = new ContentPipeline(
    {
      store,
      tracker,
      ocr: new MistralOcrService(mistral, config.mistral.ocrModel),
      classifier: new GarbageClassifier(mistral, {
        prompt: config.processing.verificationPrompt,
        maxTokens: config.mistral.maxTokens,
      }),
      titles: new TitleGenerator(mistral, {
        prompt: config.processing.titlePrompt,
        maxTokens: config.mistral.maxTokens,
      }),
    },
    {
      useStoreOcr: config.processing.useStoreOcr,
      verification: config.processing.verification,
      dryRun: config.processing.dryRun,
    }
  );

  return new BatchOrchestrator(
    {
      store,
      tracker,
      pipeline,
      scratch: new ScratchDirectory(config.processing.scratchDir),
      sleep: runtime.sleep,
    },
    {
      tracking: config.tracking,
      dryRun: config.processing.dryRun,
    }
  );
}

/** Runs one command and maps its result to a process exit code. */
export async function run(orchestrator: BatchOrchestrator, request: RunRequest): Promise<number> {
  if (request.kind === 'single') {
    const outcome = await orchestrator.runSingle(request.documentId);
    logger.info(`Document ${request.documentId} ${outcome.status}: ${outcome.reason}`);
    return outcome.status === 'failed' ? EXIT_ERROR : EXIT_SUCCESS;
  }

  const summary = await orchestrator.runAll({ exclude: request.exclude, filter: request.filter });
  if (summary.abortReason) {
    logger.error(`Batch aborted: ${summary.abortReason}`);
    return EXIT_ERROR;
  }
  return summary.failed > 0 ? EXIT_ERROR : EXIT_SUCCESS;
}
