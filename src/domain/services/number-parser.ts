/**
 * Source for a numeric token as it appears on estimator pages: digit groups
 * separated by spaces (`6 120`), or digits with `,` / `.` separators in any
 * arrangement (`6,120`, `1696.92`, `6.120,50`). Meant to be embedded in
 * larger patterns as a capture group.
 *
 * Quantifiers are bounded and the token never starts or ends inside a longer
 * digit run, so scanning stays linear in the length of the text.
 */
export const NUMERIC_TOKEN = String.raw`-?(?<![\d.,])(?:\d{1,3}(?:[ \u00a0\u202f]\d{3}){1,4}(?:[.,]\d{1,6})?|\d{1,12}(?:[.,]\d{1,12}){0,4})(?!\d)`;

export interface ParseOptions {
  /** Read `6.120` (one dot, three digits after it) as grouped thousands. */
  dotGroupsThousands?: boolean;
}

const COMMA_GROUPED = /^\d{1,3}(?:,\d{3})+$/;
const DOT_GROUPED = /^\d{1,3}(?:\.\d{3}){2,}$/;
const SINGLE_DOT_GROUP = /^\d{1,3}\.\d{3}$/;
const PLAIN_DECIMAL = /^\d+(?:\.\d+)?$/;

/**
 * Parse a numeric token, tolerating thousands separators and either decimal mark.
 *
 * - Both separators present: the rightmost one is the decimal mark.
 * - Only commas: `6,120` / `1,234,567` are grouped thousands; `1696,92` is a decimal.
 * - Only dots: a single dot is a decimal unless `dotGroupsThousands` is set
 *   and the token reads `d.ddd`; `6.120.000` is grouped thousands.
 *
 * Returns null when the token does not reduce to a number.
 */
export function parseLocaleNumber(token: string, options: ParseOptions = {}): number | null {
  let s = token.replace(/[\s\u00a0\u202f]/g, '');
  const negative = s.startsWith('-');
  if (negative) s = s.slice(1);

  const lastComma = s.lastIndexOf(',');
  const lastDot = s.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    const decimalMark = lastComma > lastDot ? ',' : '.';
    const groupMark = decimalMark === ',' ? '.' : ',';
    s = s.split(groupMark).join('').replace(decimalMark, '.');
  } else if (lastComma >= 0) {
    s = COMMA_GROUPED.test(s) ? s.replace(/,/g, '') : s.replace(',', '.');
  } else if (lastDot >= 0 && (DOT_GROUPED.test(s) || (options.dotGroupsThousands && SINGLE_DOT_GROUP.test(s)))) {
    s = s.replace(/\./g, '');
  }

  if (!PLAIN_DECIMAL.test(s)) return null;
  const value = Number(s);
  if (!Number.isFinite(value)) return null;
  return negative ? -value : value;
}
