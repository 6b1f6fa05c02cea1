const VISIBLE_LAST_DIGITS = 4;
const MIN_DIGITS_FOR_PARTIAL_MASK = 8;

const SECRET_MASK = '****';
const NUMBER_MASK_PREFIX = '****';
const SSN_MASK_REPLACEMENT = '***-**-****';
const EMAIL_MASK_REPLACEMENT = '***@***.***';

const SENSITIVE_KEYS = [
  'apikey',
  'api_key',
  'authorization',
  'password',
  'secret',
  'token',
];

const AUTH_HEADER_PATTERN = /\b(Token|Bearer)\s+[A-Za-z0-9._~+/=-]+/g;
const SSN_PATTERN_WITH_DASHES = /\b\d{3}-\d{2}-\d{4}\b/g;
const IBAN_PATTERN = /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){3,7}(?: ?[A-Z0-9]{1,3})?\b/g;
const LONG_NUMBER_PATTERN = /\b\d{12,19}\b/g;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

function cleanValue(value: string): string {
  return value.replace(/[\s-]/g, '');
}

function maskKeepingLastDigits(value: string): string {
  const cleaned = cleanValue(value);

  if (cleaned.length < MIN_DIGITS_FOR_PARTIAL_MASK) {
    return NUMBER_MASK_PREFIX;
  }

  return `${NUMBER_MASK_PREFIX}${cleaned.slice(-VISIBLE_LAST_DIGITS)}`;
}

/**
 * Scrubs credentials and personal data from log output. Document text
 * (OCR results, invoices, statements) flows through the logs in dry runs,
 * so both free text and structured values are masked.
 */
export class PIIMasker {
  maskText(text: string): string {
    let masked = text;

    masked = masked.replace(AUTH_HEADER_PATTERN, (_match, scheme: string) => `${scheme} ${SECRET_MASK}`);
    masked = masked.replace(SSN_PATTERN_WITH_DASHES, SSN_MASK_REPLACEMENT);
    masked = masked.replace(IBAN_PATTERN, maskKeepingLastDigits);
    masked = masked.replace(LONG_NUMBER_PATTERN, maskKeepingLastDigits);
    masked = masked.replace(EMAIL_PATTERN, EMAIL_MASK_REPLACEMENT);

    return masked;
  }

  maskValue(key: string, value: unknown): unknown {
    if (value === null || value === undefined) {
      return value;
    }

    if (this.shouldMask(key)) {
      return SECRET_MASK;
    }

    if (typeof value === 'string') {
      return this.maskText(value);
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.maskValue(key, item));
    }

    if (typeof value === 'object') {
      return this.maskObject(value);
    }

    return value;
  }

  maskObject(obj: object): Record<string, unknown> {
    const masked: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      masked[key] = this.maskValue(key, value);
    }

    return masked;
  }

  shouldMask(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive));
  }
}

let piiMasker: PIIMasker | null = null;

export function getPIIMasker(): PIIMasker {
  if (!piiMasker) {
    piiMasker = new PIIMasker();
  }
  return piiMasker;
}
