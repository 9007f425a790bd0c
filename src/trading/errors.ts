export type ParseRejectReason =
  | { readonly code: "empty_text" }
  | { readonly code: "missing_field"; readonly field: "direction" | "symbol" | "firstPrice" | "stopLoss" }
  | { readonly code: "invalid_levels"; readonly message: string };

export function describeRejectReason(reason: ParseRejectReason): string {
  switch (reason.code) {
    case "empty_text":
      return "empty_text";
    case "missing_field":
      return `missing_field(${reason.field})`;
    case "invalid_levels":
      return `invalid_levels: ${reason.message}`;
  }
}

export class ParseRejectedError extends Error {
  constructor(readonly reason: ParseRejectReason) {
    super(`Signal rejected: ${describeRejectReason(reason)}`);
    this.name = "ParseRejectedError";
  }
}

export class UnresolvedCommandTargetError extends Error {
  constructor(
    readonly channelId: string,
    readonly replyToMessageId: string | undefined,
  ) {
    super(`No signal bound to ${channelId}:${replyToMessageId ?? "?"}`);
    this.name = "UnresolvedCommandTargetError";
  }
}

export type SizingRejectionKind = "zero_volume" | "insufficient_margin" | "not_tradable";

export class SizingRejectedError extends Error {
  constructor(
    readonly kind: SizingRejectionKind,
    message: string,
  ) {
    super(message);
    this.name = "SizingRejectedError";
  }
}

export class VenueCallFailedError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? "unknown" : String(cause);
    super(`Venue call ${operation} failed after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = "VenueCallFailedError";
  }
}

export class StoreUnavailableError extends Error {
  constructor(cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : "store unavailable";
    super(`Signal store unavailable: ${detail}`, { cause });
    this.name = "StoreUnavailableError";
  }
}
