import * as cheerio from 'cheerio';
import {
  ANNUAL_YIELD_CEILING_KWH,
  type ExtractedMetrics,
  type ExtractionFailureReason,
  type InvalidMetrics,
  type ValidMetrics,
} from '@domain/types/metrics.js';
import { NUMERIC_TOKEN, parseLocaleNumber, type ParseOptions } from './number-parser.js';

const NUM = `(${NUMERIC_TOKEN})`;

function pattern(source: string, flags = 'i'): RegExp {
  return new RegExp(source.replaceAll('NUM', NUM), flags);
}

/** Numeric token next to a known yield label, most specific first. */
const YIELD_LABEL_PATTERNS: readonly RegExp[] = [
  pattern(String.raw`yearly\s+pv\s+energy\s+production\s*(?:\[\s*kwh\s*\])?\s*[:=]?\s*NUM`),
  pattern(String.raw`(?:annual|yearly)\s+(?:energy\s+)?(?:yield|production|output)\s*(?:\[\s*kwh\s*\]|\(\s*kwh\s*\))?\s*[:=]?\s*NUM`),
  pattern(String.raw`production\s*[:=]\s*NUM\s*kwh(?!\s*\/\s*m)`),
  pattern(String.raw`NUM\s*kwh\s*(?:\/|per)\s*(?:year|yr|an|annum)\b`),
];

/** Any token carrying a bare kWh unit (not kWh/m²). */
const LOOSE_YIELD_PATTERN = pattern(String.raw`NUM\s*kwh(?!\s*\/\s*m)`, 'gi');

const PEAK_POWER_PATTERN = pattern(
  String.raw`peak\s+(?:pv\s+)?power\s*(?:\[\s*kwp?\s*\])?\s*[:=]?\s*NUM`,
);
const SYSTEM_LOSS_PATTERN = pattern(
  String.raw`system\s+loss(?:es)?\s*(?:\[\s*%\s*\])?\s*[:=]?\s*NUM`,
);
const IRRADIATION_PATTERNS: readonly RegExp[] = [
  pattern(String.raw`irradiation\s*(?:\[[^\]]*\])?\s*[:=]\s*NUM`),
  pattern(String.raw`NUM\s*kwh\s*\/\s*m(?:²|2)`),
];

/**
 * Reduce an HTML snapshot (or plain text) to searchable text. Scripts and
 * styles are dropped, every element ends its own line so adjacent cells never
 * run together, and entities are decoded by the parser. Unicode spaces such
 * as thin or narrow no-break spaces become plain spaces.
 */
export function toPlainText(raw: string): string {
  const $ = cheerio.load(raw);
  $('script, style, noscript, template').remove();
  $('*').after('\n');
  return $.root()
    .text()
    .replace(/[^\S\n]+/g, ' ');
}

function firstNumber(patterns: readonly RegExp[], text: string, options?: ParseOptions): number | undefined {
  for (const re of patterns) {
    const token = re.exec(text)?.[1];
    if (token === undefined) continue;
    const value = parseLocaleNumber(token, options);
    if (value !== null) return value;
  }
  return undefined;
}

function invalid(reason: ExtractionFailureReason): InvalidMetrics {
  return Object.freeze({ valid: false as const, reason });
}

function inYieldRange(value: number): boolean {
  return value >= 0 && value <= ANNUAL_YIELD_CEILING_KWH;
}

type YieldMatch =
  | { kind: 'found'; value: number; matchedBy: ValidMetrics['matchedBy'] }
  | { kind: 'out_of_range' }
  | { kind: 'none' };

function matchYield(text: string): YieldMatch {
  // A labelled yearly figure of `6.120` means six thousand kWh, not six.
  const labelled = firstNumber(YIELD_LABEL_PATTERNS, text, { dotGroupsThousands: true });
  if (labelled !== undefined) {
    return inYieldRange(labelled)
      ? { kind: 'found', value: labelled, matchedBy: 'label' }
      : { kind: 'out_of_range' };
  }

  let sawOutOfRange = false;
  for (const match of text.matchAll(LOOSE_YIELD_PATTERN)) {
    const token = match[1];
    if (token === undefined) continue;
    const value = parseLocaleNumber(token);
    if (value === null) continue;
    if (inYieldRange(value)) return { kind: 'found', value, matchedBy: 'loose' };
    sawOutOfRange = true;
  }

  return sawOutOfRange ? { kind: 'out_of_range' } : { kind: 'none' };
}

/**
 * Turns a raw page snapshot into typed yield metrics.
 *
 * Tries a labelled value first (`Yearly PV energy production [kWh]: 1696.92`,
 * `6,120 kWh/year`), then falls back to any kWh-tagged token within
 * 0–100 000 kWh. Never throws: a page without a usable yield comes back as
 * `valid: false` with `no_numeric_match` or `out_of_range`.
 */
export const FieldExtractor = {
  extract(rawContent: string): ExtractedMetrics {
    const text = toPlainText(rawContent);
    const yieldMatch = matchYield(text);

    if (yieldMatch.kind === 'none') return invalid('no_numeric_match');
    if (yieldMatch.kind === 'out_of_range') return invalid('out_of_range');

    const metrics: ValidMetrics = {
      valid: true,
      annualYieldKwh: yieldMatch.value,
      matchedBy: yieldMatch.matchedBy,
    };

    const peak = firstNumber([PEAK_POWER_PATTERN], text);
    if (peak !== undefined && peak > 0) metrics.peakPowerKw = peak;

    const losses = firstNumber([SYSTEM_LOSS_PATTERN], text);
    if (losses !== undefined && losses >= 0 && losses <= 100) metrics.systemLossesPct = losses;

    const irradiation = firstNumber(IRRADIATION_PATTERNS, text);
    if (irradiation !== undefined && irradiation >= 0) metrics.irradiationKwhM2 = irradiation;

    return Object.freeze(metrics);
  },
};
