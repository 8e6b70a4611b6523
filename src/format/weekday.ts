const WEEKDAY_NAMES = ['日', '月', '火', '水', '木', '金', '土'] as const;

export const UNKNOWN_WEEKDAY = '?';

/** Japanese weekday name for a `%w` digit (0 = Sunday). */
export function weekdayName(digit: string): string {
  const index = Number(digit);
  return Number.isInteger(index) && index >= 0 && index < WEEKDAY_NAMES.length
    ? WEEKDAY_NAMES[index]
    : UNKNOWN_WEEKDAY;
}

/**
 * Replace every `(<digit>)` in rendered output with the weekday name for that
 * digit, dropping the parentheses.
 *
 * Single pass over code points with a three-character window; anything that
 * is not exactly `(`, one ASCII digit, `)` is copied through.
 *
 * @example
 * substituteWeekday('2024年01月03日(3)') // "2024年01月03日水"
 */
export function substituteWeekday(rendered: string): string {
  const chars = Array.from(rendered);
  let out = '';
  let i = 0;
  while (i < chars.length) {
    const prev = chars[i];
    const cur = chars[i + 1];
    const next = chars[i + 2];
    if (prev === '(' && cur !== undefined && cur >= '0' && cur <= '9' && next === ')') {
      out += weekdayName(cur);
      i += 3;
      continue;
    }
    out += prev;
    i += 1;
  }
  return out;
}
