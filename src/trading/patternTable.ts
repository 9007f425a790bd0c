import type { PatternEntry, PatternTableConfig } from "../config/schemas.js";
import { NUMBER_CAPTURE, NUMBER_LIST_CAPTURE } from "./numeric.js";

export type ExtractorField = keyof PatternTableConfig["fields"];

export interface CompiledPattern {
  readonly regex: RegExp;
  readonly group: number;
  readonly value?: string;
}

export interface FieldMatch {
  readonly captured: string;
  readonly value?: string;
  readonly start: number;
  readonly end: number;
}

export interface CompiledPatternTable {
  readonly fields: Readonly<Record<ExtractorField, readonly CompiledPattern[]>>;
  readonly symbolStopWords: readonly string[];
}

export class PatternCompileError extends Error {
  constructor(field: ExtractorField, index: number, detail: string) {
    super(`Invalid ${field} pattern #${index}: ${detail}`);
    this.name = "PatternCompileError";
  }
}

const PLACEHOLDERS: ReadonlyArray<readonly [string, string]> = [
  ["{numbers}", NUMBER_LIST_CAPTURE],
  ["{number}", NUMBER_CAPTURE],
];

function expandPlaceholders(source: string): string {
  return PLACEHOLDERS.reduce((pattern, [token, replacement]) => pattern.split(token).join(replacement), source);
}

function compileEntry(field: ExtractorField, entry: PatternEntry, index: number): CompiledPattern {
  let regex: RegExp;
  try {
    regex = new RegExp(expandPlaceholders(entry.pattern), "giu");
  } catch (error) {
    throw new PatternCompileError(field, index, error instanceof Error ? error.message : String(error));
  }
  if (field === "direction" && entry.value !== "buy" && entry.value !== "sell") {
    throw new PatternCompileError(field, index, "direction patterns need a value of buy or sell");
  }
  return { regex, group: entry.group, value: entry.value };
}

/** Compiles the configured table once; the result is never mutated afterwards. */
export function compilePatternTable(config: PatternTableConfig): CompiledPatternTable {
  const compileField = (field: ExtractorField): readonly CompiledPattern[] =>
    Object.freeze(config.fields[field].map((entry, index) => compileEntry(field, entry, index)));

  return Object.freeze({
    fields: Object.freeze({
      direction: compileField("direction"),
      symbol: compileField("symbol"),
      firstPrice: compileField("firstPrice"),
      secondPrice: compileField("secondPrice"),
      stopLoss: compileField("stopLoss"),
      takeProfit: compileField("takeProfit"),
    }),
    symbolStopWords: Object.freeze([...config.symbolStopWords]),
  });
}

function toFieldMatch(pattern: CompiledPattern, match: RegExpMatchArray): FieldMatch | undefined {
  const captured = match[pattern.group];
  if (captured === undefined || match.index === undefined) {
    return undefined;
  }
  return {
    captured,
    value: pattern.value,
    start: match.index,
    end: match.index + match[0].length,
  };
}

/** Every match of one pattern, in text order. */
export function matchAll(pattern: CompiledPattern, text: string): FieldMatch[] {
  const matches: FieldMatch[] = [];
  for (const match of text.matchAll(pattern.regex)) {
    const fieldMatch = toFieldMatch(pattern, match);
    if (fieldMatch) {
      matches.push(fieldMatch);
    }
  }
  return matches;
}

/** First match of the highest-priority pattern that matches at all. */
export function firstMatch(patterns: readonly CompiledPattern[], text: string): FieldMatch | undefined {
  for (const pattern of patterns) {
    const [match] = matchAll(pattern, text);
    if (match) {
      return match;
    }
  }
  return undefined;
}

/** All matches of the highest-priority pattern that matches at all. */
export function matchesOfFirstPattern(patterns: readonly CompiledPattern[], text: string): FieldMatch[] {
  for (const pattern of patterns) {
    const matches = matchAll(pattern, text);
    if (matches.length > 0) {
      return matches;
    }
  }
  return [];
}

/** Replaces matched spans with spaces so later extractors cannot reuse them, keeping offsets intact. */
export function blankSpans(text: string, spans: readonly FieldMatch[]): string {
  let result = text;
  for (const span of spans) {
    result = result.slice(0, span.start) + " ".repeat(span.end - span.start) + result.slice(span.end);
  }
  return result;
}
