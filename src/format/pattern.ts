/**
 * Format keyword resolution.
 *
 * A `--format` value is either one of the built-in keywords or a literal
 * strftime-style pattern handed straight to the renderer.
 */

export type FormatKeyword = 'default' | 'iso' | 'jp' | 'jpwd' | 'jphm' | 'jphms';

export type FormatSpec =
  | { kind: 'keyword'; keyword: FormatKeyword }
  | { kind: 'custom'; pattern: string };

const JP_DATE = '%Y年%m月%d日';

const KEYWORD_PATTERNS: Record<FormatKeyword, string> = {
  default: '%Y-%m-%d',
  iso: '%Y-%m-%dT%H:%M:%S%z',
  jp: JP_DATE,
  // `%w` renders the weekday as a digit; see substituteWeekday().
  jpwd: `${JP_DATE}(%w)`,
  jphm: `${JP_DATE} %H時%M分`,
  jphms: `${JP_DATE} %H時%M分%S秒`,
};

export const FORMAT_KEYWORDS: readonly FormatKeyword[] = [
  'default',
  'iso',
  'jp',
  'jpwd',
  'jphm',
  'jphms',
];

export function isFormatKeyword(s: string): s is FormatKeyword {
  return Object.prototype.hasOwnProperty.call(KEYWORD_PATTERNS, s);
}

/**
 * Classify a `--format` value.
 *
 * Built-in keywords win over `named` formats (from the config file); any
 * other string is a custom pattern.
 */
export function parseFormatSpec(
  input: string | undefined,
  named: Readonly<Record<string, string>> = {},
): FormatSpec {
  if (input === undefined) {
    return { kind: 'keyword', keyword: 'default' };
  }
  if (isFormatKeyword(input)) {
    return { kind: 'keyword', keyword: input };
  }
  if (Object.prototype.hasOwnProperty.call(named, input)) {
    return { kind: 'custom', pattern: named[input] };
  }
  return { kind: 'custom', pattern: input };
}

export function patternFor(spec: FormatSpec): string {
  switch (spec.kind) {
    case 'keyword':
      return KEYWORD_PATTERNS[spec.keyword];
    case 'custom':
      return spec.pattern;
  }
}

/**
 * Map a format keyword to its pattern. Never fails: unrecognised input is
 * returned verbatim.
 *
 * @example
 * resolveFormat(undefined)  // "%Y-%m-%d"
 * resolveFormat('iso')      // "%Y-%m-%dT%H:%M:%S%z"
 * resolveFormat('%H:%M:%S') // "%H:%M:%S"
 */
export function resolveFormat(keyword?: string): string {
  return patternFor(parseFormatSpec(keyword));
}

/** Whether rendered output needs {@link substituteWeekday} applied. */
export function needsWeekdaySubstitution(spec: FormatSpec): boolean {
  return spec.kind === 'keyword' && spec.keyword === 'jpwd';
}
