import { parseArgs } from 'node:util';
import { UsageError, describeError } from '../utils/errors';
import type { ConfigOverrides } from '../config/AppConfig';

export const USAGE = `Usage: retitler [options] <command>

Commands:
  single <document_id>              retitle one document
  all [--exclude ID]... [--filterstr STR]
                                    retitle every document matching the filter

Options:
  -l, --loglevel LEVEL              DEBUG, INFO, WARNING, ERROR or CRITICAL
      --dry                         log proposed changes without writing them
      --paperlessurl URL            paperless-ngx base URL
      --paperlesskey KEY            paperless-ngx API token
      --mistralmodel MODEL          chat model used for titles and verification
      --mistralkey KEY              Mistral API key
      --ocr-model MODEL             Mistral OCR model
      --use-paperless-ocr           keep paperless' own text instead of running OCR
      --verify-ocr POLICY           off, after-ocr or always
      --track-processed             mark processed documents in a custom field
      --no-track-processed          do not read or write the processed marker
      --processed-field-id ID       preferred id of the marker field
      --processed-field-name NAME   name of the marker field
      --reprocess                   process documents that are already marked
  -h, --help                        show this help`;

export interface CliOverrides {
  overrides: ConfigOverrides;
}

export type CliCommand =
  | { kind: 'help' }
  | ({ kind: 'single'; documentId: number } & CliOverrides)
  | ({ kind: 'all'; exclude: number[]; filter?: string } & CliOverrides);

function parseDocumentId(value: string, label: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new UsageError(`${label} must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        loglevel: { type: 'string', short: 'l' },
        dry: { type: 'boolean' },
        paperlessurl: { type: 'string' },
        paperlesskey: { type: 'string' },
        mistralmodel: { type: 'string' },
        mistralkey: { type: 'string' },
        'ocr-model': { type: 'string' },
        'use-paperless-ocr': { type: 'boolean' },
        'verify-ocr': { type: 'string' },
        'track-processed': { type: 'boolean' },
        'no-track-processed': { type: 'boolean' },
        'processed-field-id': { type: 'string' },
        'processed-field-name': { type: 'string' },
        reprocess: { type: 'boolean' },
        exclude: { type: 'string', multiple: true },
        filterstr: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(describeError(error));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  if (values['track-processed'] && values['no-track-processed']) {
    throw new UsageError('--track-processed and --no-track-processed are mutually exclusive');
  }

  const overrides: ConfigOverrides = {
    logLevel: values.loglevel,
    dryRun: values.dry,
    paperlessUrl: values.paperlessurl,
    paperlessApiKey: values.paperlesskey,
    mistralModel: values.mistralmodel,
    mistralApiKey: values.mistralkey,
    mistralOcrModel: values['ocr-model'],
    usePaperlessOcr: values['use-paperless-ocr'],
    verifyOcr: values['verify-ocr'],
    trackProcessed: values['no-track-processed'] ? false : values['track-processed'],
    processedFieldId: values['processed-field-id'],
    processedFieldName: values['processed-field-name'],
    reprocess: values.reprocess,
  };

  const [command, ...rest] = positionals;
  switch (command) {
    case 'single': {
      if (rest.length !== 1) {
        throw new UsageError('single expects exactly one document id');
      }
      if (values.exclude !== undefined || values.filterstr !== undefined) {
        throw new UsageError('--exclude and --filterstr only apply to the all command');
      }
      return { kind: 'single', documentId: parseDocumentId(rest[0], 'document_id'), overrides };
    }
    case 'all': {
      if (rest.length > 0) {
        throw new UsageError(`all takes no positional arguments, got "${rest.join(' ')}"`);
      }
      const exclude = (values.exclude ?? []).map((value) => parseDocumentId(value, '--exclude'));
      return { kind: 'all', exclude, filter: values.filterstr, overrides };
    }
    case undefined:
      throw new UsageError('missing command');
    default:
      throw new UsageError(`unknown command "${command}"`);
  }
}
