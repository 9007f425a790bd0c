import { z } from "zod";

const direction = z.enum(["buy", "sell"]);
const status = z.enum(["pending", "open", "partially_closed", "closed", "cancelled", "error"]);

const messageRef = z.object({
  channelId: z.string(),
  messageId: z.string(),
});

export const TicketRecordSchema = z.object({
  id: z.string(),
  signalId: z.string(),
  symbol: z.string(),
  direction,
  kind: z.enum(["order", "position"]),
  leg: z.number().int().nonnegative(),
  volume: z.number().nonnegative(),
  initialVolume: z.number().nonnegative(),
  volumeStep: z.number().positive(),
  minVolume: z.number().nonnegative(),
  openPrice: z.number(),
  stopLoss: z.number().optional(),
  takeProfit: z.number().optional(),
  openedAt: z.number(),
  filledAt: z.number().optional(),
  consumedProfitSteps: z.array(z.number().int().nonnegative()),
  closedAt: z.number().optional(),
  closeReason: z.enum(["command", "expired", "venue", "profit_saving"]).optional(),
});

export const SignalEventSchema = z.object({
  at: z.number(),
  type: z.enum([
    "created",
    "placed",
    "placement_failed",
    "sizing_rejected",
    "edited",
    "risk_free",
    "half_closed",
    "take_profit_now",
    "deleted",
    "trailing_stop",
    "profit_saved",
    "order_filled",
    "order_expired",
    "closed_at_venue",
    "adopted",
    "command_ignored",
    "venue_failure",
  ]),
  status,
  ticketId: z.string().optional(),
  detail: z.record(z.unknown()).optional(),
});

export const SignalRecordSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  rawSymbol: z.string(),
  direction,
  entryPrices: z.array(z.number()).min(1),
  stopLoss: z.number(),
  takeProfits: z.array(z.number()),
  source: messageRef,
  status,
  tickets: z.array(TicketRecordSchema),
  history: z.array(SignalEventSchema),
  errorReason: z.string().optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export const SignalStoreDocumentSchema = z.object({
  signals: z.array(SignalRecordSchema).default([]),
  processedMessages: z.array(z.string()).default([]),
});

export type SignalStoreDocument = z.infer<typeof SignalStoreDocumentSchema>;
