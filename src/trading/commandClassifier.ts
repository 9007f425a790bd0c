import type { KeywordTableConfig } from "../config/schemas.js";
import { normalizeDigits, parseNumericToken } from "./numeric.js";
import type { SignalParser } from "./signalParser.js";
import type { CommandIntent, CommandKind } from "./types.js";

/** Overlapping keywords resolve to the first kind in this list. */
export const COMMAND_PRIORITY: readonly CommandKind[] = ["delete", "riskFree", "halfClose", "takeProfitNow", "edit"];

export type ClassifyOutcome =
  | { readonly kind: "command"; readonly command: CommandIntent }
  | { readonly kind: "not_a_command"; readonly reason: "no_keyword" | "edit_without_values" };

interface KeywordMatcher {
  readonly kind: CommandKind;
  readonly patterns: readonly RegExp[];
}

const BARE_NUMBER = /(?<![\p{L}\p{N}.,])(\d+(?:[.,]\d+)*)(?![\p{L}\p{N}])/gu;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches a keyword as a whole word or phrase, including non-Latin scripts. */
function compileKeyword(keyword: string): RegExp {
  const body = keyword
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join("[\\s\\-_]*");
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "iu");
}

export interface CommandClassifierOptions {
  readonly keywords: KeywordTableConfig;
  /** Supplies stop-loss and take-profit extraction for edit replies. */
  readonly parser: SignalParser;
}

export class CommandClassifier {
  private readonly matchers: readonly KeywordMatcher[];
  private readonly parser: SignalParser;

  constructor(options: CommandClassifierOptions) {
    this.parser = options.parser;
    this.matchers = COMMAND_PRIORITY.map((kind) => ({
      kind,
      patterns: options.keywords[kind].map(compileKeyword),
    }));
  }

  matchedKind(replyText: string): CommandKind | undefined {
    const text = normalizeDigits(replyText);
    return this.matchers.find((matcher) => matcher.patterns.some((pattern) => pattern.test(text)))?.kind;
  }

  classify(replyText: string): ClassifyOutcome {
    const kind = this.matchedKind(replyText);
    switch (kind) {
      case undefined:
        return { kind: "not_a_command", reason: "no_keyword" };
      case "edit":
        return this.classifyEdit(replyText);
      case "delete":
      case "riskFree":
      case "halfClose":
      case "takeProfitNow":
        return { kind: "command", command: { kind } };
    }
  }

  private classifyEdit(replyText: string): ClassifyOutcome {
    const levels = this.parser.extractLevels(replyText);
    if (levels.stopLoss !== undefined || levels.takeProfits.length > 0) {
      return {
        kind: "command",
        command: {
          kind: "edit",
          stopLoss: levels.stopLoss,
          takeProfits: levels.takeProfits.length > 0 ? levels.takeProfits : undefined,
        },
      };
    }

    const bareNumbers = [...normalizeDigits(replyText).matchAll(BARE_NUMBER)]
      .map((match) => parseNumericToken(match[1] ?? ""))
      .filter((value): value is number => value !== undefined);
    const [onlyNumber] = bareNumbers;
    if (bareNumbers.length === 1 && onlyNumber !== undefined) {
      return { kind: "command", command: { kind: "edit", stopLoss: onlyNumber } };
    }
    return { kind: "not_a_command", reason: "edit_without_values" };
  }
}
