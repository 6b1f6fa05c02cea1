export const MAX_TITLE_LENGTH = 32;

const DISALLOWED_RUN = /[^\p{L}\p{N}_]+/gu;
const DISALLOWED_CHAR = /[^\p{L}\p{N}_]/u;
const BAD_UNDERSCORES = /^_|_$|__/;

function codePoints(value: string): string[] {
  return Array.from(value);
}

/**
 * Ways a title breaks the naming rules: lowercase, letters/digits joined by
 * single underscores, at most MAX_TITLE_LENGTH characters. Empty when the
 * title is valid.
 */
export function titleProblems(title: string): string[] {
  const problems: string[] = [];

  if (title !== title.toLowerCase()) {
    problems.push('not lowercase');
  }
  if (DISALLOWED_CHAR.test(title)) {
    problems.push('contains characters other than letters, digits and underscores');
  }
  if (BAD_UNDERSCORES.test(title)) {
    problems.push('has leading, trailing or repeated underscores');
  }
  if (codePoints(title).length > MAX_TITLE_LENGTH) {
    problems.push(`longer than ${MAX_TITLE_LENGTH} characters`);
  }

  return problems;
}

export function normalizeTitle(raw: string): string {
  const joined = raw
    .trim()
    .toLowerCase()
    .replace(DISALLOWED_RUN, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');

  return codePoints(joined).slice(0, MAX_TITLE_LENGTH).join('').replace(/_+$/, '');
}
