import { getPIIMasker } from '../services/masking/PIIMasker';
import type { LogLevel } from '@retitler/shared/schemas/paperless.zod';

const MASK_PII_DISABLE_VALUE = 'false';

const LEVEL_SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

const masker = getPIIMasker();

export interface LoggerSettings {
  level: LogLevel;
  maskPii: boolean;
}

let threshold: number = LEVEL_SEVERITY.INFO;
let maskingEnabled = process.env.MASK_PII !== MASK_PII_DISABLE_VALUE;

export function configureLogger(settings: LoggerSettings): void {
  threshold = LEVEL_SEVERITY[settings.level];
  maskingEnabled = settings.maskPii;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_SEVERITY[level] >= threshold;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function timestamp(now: Date = new Date()): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `${date} ${time}`;
}

function maskError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: masker.maskText(error.message),
    stack: error.stack ? masker.maskText(error.stack) : undefined,
  };
}

function maskArg(arg: unknown): unknown {
  if (!maskingEnabled) {
    return arg;
  }

  if (typeof arg === 'string') {
    return masker.maskText(arg);
  }

  if (typeof arg === 'object' && arg !== null) {
    if (arg instanceof Error) {
      return maskError(arg);
    }

    if (Array.isArray(arg)) {
      return arg.map(maskArg);
    }

    return masker.maskObject(arg);
  }

  return arg;
}

function emit(level: LogLevel, write: (...args: unknown[]) => void, args: unknown[]): void {
  if (!isEnabled(level)) {
    return;
  }
  write(`${timestamp()} ${level}`, ...args.map(maskArg));
}

export const logger = {
  debug: (...args: unknown[]) => emit('DEBUG', console.debug, args),

  info: (...args: unknown[]) => emit('INFO', console.info, args),

  warn: (...args: unknown[]) => emit('WARNING', console.warn, args),

  error: (...args: unknown[]) => emit('ERROR', console.error, args),

  critical: (...args: unknown[]) => emit('CRITICAL', console.error, args),
};
