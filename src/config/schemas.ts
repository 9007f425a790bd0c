import { z } from "zod";

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

export const SizingSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("fixed"),
    volume: z.number().positive(),
  }),
  z.object({
    mode: z.literal("percentOfBalance"),
    percent: z.number().positive().max(100),
    basis: z.enum(["balance", "equity"]).default("balance"),
    /** `risk` sizes so that hitting the stop-loss loses `percent` of the basis; `notional` spends it on exposure. */
    allocation: z.enum(["risk", "notional"]).default("risk"),
  }),
]);

export const DualEntrySchema = z.object({
  enabled: z.boolean().default(false),
  /** Share of the computed volume placed on the first entry leg. */
  splitRatio: z.number().gt(0).lt(1).default(0.5),
});

const TrailingLevelsSchema = z.object({
  threshold: z.number().nonnegative(),
  step: z.number().positive(),
});

/** Threshold and step are in the instrument's price units (or account currency for `floatingProfit`). */
export const TrailingStopSchema = TrailingLevelsSchema.extend({
  enabled: z.boolean().default(true),
  metric: z.enum(["priceDistance", "floatingProfit"]).default("priceDistance"),
  /** Per-symbol levels for instruments quoted on a different scale than the defaults. */
  symbols: z.record(TrailingLevelsSchema).default({}),
});

export const ProfitSavingSchema = z
  .object({
    enabled: z.boolean().default(false),
    mode: z.enum(["distance", "takeProfits"]).default("takeProfits"),
    thresholds: z.array(z.number().positive()).default([]),
    closeFractions: z.array(z.number().gt(0).max(1)).default([]),
  })
  .refine((value) => value.mode !== "distance" || value.thresholds.length === value.closeFractions.length, {
    message: "distance mode needs one threshold per close fraction",
  })
  .refine((value) => value.thresholds.every((threshold, index, all) => index === 0 || threshold > (all[index - 1] ?? 0)), {
    message: "thresholds must be strictly increasing",
  });

const ListFilterSchema = z.object({
  allow: z.array(z.string()).default([]),
  deny: z.array(z.string()).default([]),
});

export const FiltersSchema = z.object({
  channels: ListFilterSchema.default({}),
  symbols: ListFilterSchema.default({}),
  tradingWindow: z
    .object({
      start: clockTime,
      end: clockTime,
    })
    .optional(),
});

export const ProviderEntrySchema = z.object({
  name: z.string().min(1),
  options: z.record(z.unknown()).default({}),
});

export const EngineSettingsSchema = z.object({
  sizing: SizingSchema,
  dualEntry: DualEntrySchema.default({}),
  trailingStop: TrailingStopSchema,
  profitSaving: ProfitSavingSchema.default({}),
  pendingOrderExpiryMinutes: z.number().positive().default(60),
  monitor: z
    .object({
      intervalMs: z.number().int().positive().default(5_000),
    })
    .default({}),
  filters: FiltersSchema.default({}),
  symbols: z
    .object({
      aliases: z.record(z.string()).default({}),
      known: z.array(z.string()).default([]),
    })
    .default({}),
  providers: z.array(ProviderEntrySchema).default([]),
});

const PatternEntrySchema = z.object({
  pattern: z.string().min(1),
  group: z.number().int().nonnegative().default(1),
  value: z.string().optional(),
});

const PatternListSchema = z.array(PatternEntrySchema).min(1);

export const PatternTableSchema = z.object({
  fields: z.object({
    direction: PatternListSchema,
    symbol: PatternListSchema,
    firstPrice: PatternListSchema,
    secondPrice: z.array(PatternEntrySchema).default([]),
    stopLoss: PatternListSchema,
    takeProfit: z.array(PatternEntrySchema).default([]),
  }),
  symbolStopWords: z.array(z.string()).default([]),
});

const KeywordListSchema = z.array(z.string().min(1)).min(1);

export const KeywordTableSchema = z.object({
  delete: KeywordListSchema,
  riskFree: KeywordListSchema,
  halfClose: KeywordListSchema,
  takeProfitNow: KeywordListSchema,
  edit: KeywordListSchema,
});

export type SizingPolicy = z.infer<typeof SizingSchema>;
export type DualEntryPolicy = z.infer<typeof DualEntrySchema>;
export type TrailingStopPolicy = z.infer<typeof TrailingStopSchema>;
export type ProfitSavingPolicy = z.infer<typeof ProfitSavingSchema>;
export type SignalFilters = z.infer<typeof FiltersSchema>;
export type ProviderEntry = z.infer<typeof ProviderEntrySchema>;
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;
export type PatternTableConfig = z.infer<typeof PatternTableSchema>;
export type PatternEntry = z.infer<typeof PatternEntrySchema>;
export type KeywordTableConfig = z.infer<typeof KeywordTableSchema>;
