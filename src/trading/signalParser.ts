import { describeRejectReason, ParseRejectedError, type ParseRejectReason } from "./errors.js";
import { normalizeDigits, parseNumericToken, splitNumberList } from "./numeric.js";
import {
  blankSpans,
  firstMatch,
  matchAll,
  matchesOfFirstPattern,
  type CompiledPatternTable,
  type FieldMatch,
} from "./patternTable.js";
import { dedupePrices, validateSignalLevels } from "./signalValidation.js";
import type { SymbolResolver } from "./symbolResolver.js";
import type { Direction, ParsedSignal } from "./types.js";

export type ParseOutcome =
  | { readonly kind: "signal"; readonly signal: ParsedSignal }
  | { readonly kind: "rejected"; readonly reason: ParseRejectReason };

export interface SignalParserOptions {
  readonly patterns: CompiledPatternTable;
  readonly symbols: SymbolResolver;
  /** Keep a distinct second entry price when one is found. */
  readonly dualEntry?: boolean;
}

interface LevelExtraction {
  readonly stopLoss?: number;
  readonly takeProfits: number[];
  readonly spans: FieldMatch[];
}

function rejected(reason: ParseRejectReason): ParseOutcome {
  return { kind: "rejected", reason };
}

/**
 * Turns free text into a {@link ParsedSignal}. Every field is taken from the
 * highest-priority pattern that matches; stop-loss and take-profit spans are
 * blanked out before entry prices and symbol are searched so their numbers
 * cannot be mistaken for an entry.
 *
 * The parser is pure: it never touches storage or the venue.
 */
export class SignalParser {
  private readonly patterns: CompiledPatternTable;
  private readonly symbols: SymbolResolver;
  private readonly dualEntry: boolean;

  constructor(options: SignalParserOptions) {
    this.patterns = options.patterns;
    this.symbols = options.symbols;
    this.dualEntry = options.dualEntry ?? false;
  }

  parse(text: string): ParseOutcome {
    const normalized = normalizeDigits(text).trim();
    if (!normalized) {
      return rejected({ code: "empty_text" });
    }

    const direction = this.extractDirection(normalized);
    const levels = this.extractLevels(normalized);
    const entryText = blankSpans(normalized, levels.spans);
    const symbol = this.extractSymbol(entryText);
    const entryPrices = this.extractEntryPrices(entryText);

    if (!direction) {
      return rejected({ code: "missing_field", field: "direction" });
    }
    if (!symbol) {
      return rejected({ code: "missing_field", field: "symbol" });
    }
    if (entryPrices.length === 0) {
      return rejected({ code: "missing_field", field: "firstPrice" });
    }
    if (levels.stopLoss === undefined) {
      return rejected({ code: "missing_field", field: "stopLoss" });
    }

    const violation = validateSignalLevels(direction, entryPrices, levels.stopLoss, levels.takeProfits);
    if (violation) {
      return rejected({ code: "invalid_levels", message: violation });
    }

    return {
      kind: "signal",
      signal: {
        symbol: symbol.symbol,
        rawSymbol: symbol.raw,
        direction,
        entryPrices,
        stopLoss: levels.stopLoss,
        takeProfits: levels.takeProfits,
        text,
      },
    };
  }

  parseOrThrow(text: string): ParsedSignal {
    const outcome = this.parse(text);
    if (outcome.kind === "rejected") {
      throw new ParseRejectedError(outcome.reason);
    }
    return outcome.signal;
  }

  describe(outcome: ParseOutcome): string {
    return outcome.kind === "signal" ? `${outcome.signal.direction} ${outcome.signal.symbol}` : describeRejectReason(outcome.reason);
  }

  /** Stop-loss and take-profit values only, as used for edit replies. */
  extractLevels(text: string): LevelExtraction {
    const normalized = normalizeDigits(text);
    const spans: FieldMatch[] = [];

    const stopMatch = firstMatch(this.patterns.fields.stopLoss, normalized);
    const stopLoss = stopMatch ? parseNumericToken(stopMatch.captured) : undefined;
    if (stopMatch) {
      spans.push(stopMatch);
    }

    const targetMatches = matchesOfFirstPattern(this.patterns.fields.takeProfit, normalized);
    spans.push(...targetMatches);
    const takeProfits = dedupePrices(targetMatches.flatMap((match) => splitNumberList(match.captured)));

    return { stopLoss, takeProfits, spans };
  }

  private extractDirection(text: string): Direction | undefined {
    const match = firstMatch(this.patterns.fields.direction, text);
    if (match?.value === "buy" || match?.value === "sell") {
      return match.value;
    }
    return undefined;
  }

  private extractSymbol(text: string): { readonly symbol: string; readonly raw: string } | undefined {
    for (const pattern of this.patterns.fields.symbol) {
      for (const match of matchAll(pattern, text)) {
        const symbol = this.symbols.resolve(match.captured);
        if (symbol) {
          return { symbol, raw: match.captured };
        }
      }
    }
    return undefined;
  }

  private extractEntryPrices(text: string): number[] {
    const firstEntry = firstMatch(this.patterns.fields.firstPrice, text);
    const first = firstEntry ? parseNumericToken(firstEntry.captured) : undefined;
    if (first === undefined) {
      return [];
    }
    if (!this.dualEntry) {
      return [first];
    }
    const secondEntry = firstMatch(this.patterns.fields.secondPrice, text);
    const second = secondEntry ? parseNumericToken(secondEntry.captured) : undefined;
    return second !== undefined && second !== first ? [first, second] : [first];
  }
}
