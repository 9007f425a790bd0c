import type { DualEntryPolicy, SizingPolicy } from "../config/schemas.js";
import { SizingRejectedError, type SizingRejectionKind } from "../trading/errors.js";
import type { Signal } from "../trading/types.js";
import type { AccountState, InstrumentInfo, OrderParams } from "../venue/types.js";

export type SizingResult =
  | { readonly ok: true; readonly orders: readonly OrderParams[]; readonly totalVolume: number }
  | { readonly ok: false; readonly kind: SizingRejectionKind; readonly message: string };

export interface SizingCalculatorConfig {
  readonly sizing: SizingPolicy;
  readonly dualEntry: DualEntryPolicy;
}

const VOLUME_EPSILON = 1e-6;

export function volumeStepOf(instrument: InstrumentInfo): number {
  return instrument.volumeStep && instrument.volumeStep > 0 ? instrument.volumeStep : instrument.minVolume;
}

function stepDecimals(step: number): number {
  const text = step.toString();
  const exponent = /e-(\d+)$/.exec(text);
  if (exponent?.[1]) {
    return Number.parseInt(exponent[1], 10);
  }
  const [, fraction = ""] = text.split(".");
  return fraction.length;
}

/** Rounds down to a multiple of `step`, trimming float noise. */
export function roundVolumeDown(volume: number, step: number): number {
  if (!(step > 0)) {
    return volume;
  }
  const units = Math.floor(volume / step + VOLUME_EPSILON);
  return Number((units * step).toFixed(stepDecimals(step)));
}

function rejected(kind: SizingRejectionKind, message: string): SizingResult {
  return { ok: false, kind, message };
}

/**
 * Resolves the volume for a signal and splits it across entry legs. Never
 * clamps: a volume that rounds below the instrument minimum, a margin
 * shortfall or an untradable symbol is reported as its own rejection kind.
 */
export class SizingCalculator {
  constructor(private readonly config: SizingCalculatorConfig) {}

  size(signal: Signal, account: AccountState, instrument: InstrumentInfo): SizingResult {
    if (!instrument.tradable) {
      return rejected("not_tradable", `${signal.symbol} is not tradable`);
    }

    const step = volumeStepOf(instrument);
    const referenceEntry = signal.entryPrices[0] ?? 0;
    const totalVolume = roundVolumeDown(this.resolveVolume(signal, account, instrument, referenceEntry), step);
    if (!(totalVolume >= instrument.minVolume) || totalVolume <= 0) {
      return rejected("zero_volume", `computed volume ${totalVolume} is below minimum ${instrument.minVolume}`);
    }

    const legs = this.splitLegs(signal, totalVolume, step);
    if (legs.some((volume) => volume < instrument.minVolume || volume <= 0)) {
      return rejected("zero_volume", `volume ${totalVolume} cannot be split into legs of at least ${instrument.minVolume}`);
    }

    const leverage = instrument.leverage && instrument.leverage > 0 ? instrument.leverage : 1;
    const requiredMargin = signal.entryPrices.reduce(
      (sum, price, index) => sum + ((legs[index] ?? 0) * instrument.contractSize * price) / leverage,
      0,
    );
    const freeMargin = account.equity - account.margin;
    if (requiredMargin > freeMargin) {
      return rejected(
        "insufficient_margin",
        `required margin ${requiredMargin.toFixed(2)} exceeds free margin ${freeMargin.toFixed(2)}`,
      );
    }

    const finalTarget = signal.takeProfits[signal.takeProfits.length - 1];
    const orders = legs.map((volume, leg) => ({
      signalId: signal.id,
      symbol: signal.symbol,
      direction: signal.direction,
      volume,
      entryPrice: signal.entryPrices[leg] ?? referenceEntry,
      stopLoss: signal.stopLoss,
      takeProfit: finalTarget,
      leg,
    } satisfies OrderParams));

    return { ok: true, orders, totalVolume };
  }

  sizeOrThrow(signal: Signal, account: AccountState, instrument: InstrumentInfo): readonly OrderParams[] {
    const result = this.size(signal, account, instrument);
    if (!result.ok) {
      throw new SizingRejectedError(result.kind, result.message);
    }
    return result.orders;
  }

  private resolveVolume(signal: Signal, account: AccountState, instrument: InstrumentInfo, entry: number): number {
    const policy = this.config.sizing;
    if (policy.mode === "fixed") {
      return policy.volume;
    }

    const basis = policy.basis === "equity" ? account.equity : account.balance;
    const amount = (basis * policy.percent) / 100;
    const perUnit =
      policy.allocation === "risk"
        ? Math.abs(entry - signal.stopLoss) * instrument.contractSize
        : entry * instrument.contractSize;
    return perUnit > 0 ? amount / perUnit : 0;
  }

  private splitLegs(signal: Signal, totalVolume: number, step: number): number[] {
    if (signal.entryPrices.length < 2 || !this.config.dualEntry.enabled) {
      return [totalVolume];
    }
    const first = roundVolumeDown(totalVolume * this.config.dualEntry.splitRatio, step);
    const second = roundVolumeDown(totalVolume - first, step);
    return [first, second];
  }
}
