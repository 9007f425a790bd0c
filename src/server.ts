import express, { type Request, type Response } from "express";
import { z } from "zod";

import type { EngineRuntime } from "./runtime/botRuntime.js";
import { SourceNotStartedError } from "./sources/queueSource.js";
import { describeError } from "./telemetry/logger.js";
import { describeRejectReason, StoreUnavailableError } from "./trading/errors.js";
import type { Command, CommandIntent } from "./trading/types.js";

export type ApiRuntime = Pick<EngineRuntime, "engine" | "journal" | "parser" | "pipeline" | "queue" | "reports">;

const ParseBodySchema = z.object({
  text: z.string(),
});

const MessageBodySchema = z.object({
  messageId: z.union([z.string().min(1), z.number().int()]).transform(String),
  channelId: z.string().min(1).optional(),
  replyToMessageId: z.union([z.string().min(1), z.number().int()]).transform(String).optional(),
  text: z.string(),
  edited: z.boolean().optional(),
});

const PeriodQuerySchema = z.object({
  from: z.coerce.number().int().nonnegative().optional(),
  until: z.coerce.number().int().nonnegative().optional(),
});

const ReportQuerySchema = PeriodQuerySchema.extend({
  minPositions: z.coerce.number().int().positive().optional(),
});

const price = z.number().positive();

const CommandBodySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("edit"),
    stopLoss: price.optional(),
    takeProfits: z.array(price).min(1).optional(),
    requestId: z.string().min(1).optional(),
  }),
  z.object({ kind: z.literal("delete"), requestId: z.string().min(1).optional() }),
  z.object({ kind: z.literal("riskFree"), requestId: z.string().min(1).optional() }),
  z.object({ kind: z.literal("halfClose"), requestId: z.string().min(1).optional() }),
  z.object({ kind: z.literal("takeProfitNow"), requestId: z.string().min(1).optional() }),
]).refine((body) => body.kind !== "edit" || body.stopLoss !== undefined || body.takeProfits !== undefined, {
  message: "edit needs stopLoss or takeProfits",
});

type CommandBody = z.infer<typeof CommandBodySchema>;

function toIntent(body: CommandBody): CommandIntent {
  switch (body.kind) {
    case "edit":
      return { kind: "edit", stopLoss: body.stopLoss, takeProfits: body.takeProfits };
    default:
      return { kind: body.kind };
  }
}

function parseLimit(raw: unknown, fallback: number): number {
  const limit = Number.parseInt(String(raw ?? fallback), 10);
  return Number.isFinite(limit) && limit > 0 ? Math.min(limit, 500) : fallback;
}

function validationMessage(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

function sendFailure(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof StoreUnavailableError) {
    res.status(503).json({ error: error.message });
    return;
  }
  res.status(500).json({ error: error instanceof Error ? error.message : fallbackMessage });
}

let requestSequence = 0;

export function createApp(runtime: ApiRuntime): express.Express {
  const app = express();
  app.use(express.json());

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: runtime.pipeline.halted ? "halted" : "ok",
      activeSignals: runtime.engine.listActiveSignals().length,
    });
  });

  app.get("/api/signals/active", (_req: Request, res: Response) => {
    res.json({ items: runtime.engine.listActiveSignals() });
  });

  app.get("/api/positions", (_req: Request, res: Response) => {
    res.json({ items: runtime.engine.listOpenPositions() });
  });

  app.get("/api/signals/history", (req: Request, res: Response) => {
    res.json({ items: runtime.engine.signalHistory(parseLimit(req.query.limit, 20)) });
  });

  app.get("/api/signals/:id", (req: Request, res: Response) => {
    const signal = runtime.engine.getSignal(req.params.id ?? "");
    if (!signal) {
      res.status(404).json({ error: "Signal not found" });
      return;
    }
    res.json(signal);
  });

  app.get("/api/events", async (req: Request, res: Response) => {
    try {
      const items = await runtime.journal.recent(parseLimit(req.query.limit, 50));
      res.json({ items });
    } catch (error) {
      sendFailure(res, error, "Unable to load events");
    }
  });

  app.get("/api/reports/channels", async (req: Request, res: Response) => {
    const query = ReportQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: validationMessage(query.error) });
      return;
    }
    try {
      res.json({ items: await runtime.reports.compare(query.data) });
    } catch (error) {
      sendFailure(res, error, "Unable to build the channel report");
    }
  });

  app.get("/api/reports/channels/:channelId", async (req: Request, res: Response) => {
    const channelId = req.params.channelId ?? "";
    const query = PeriodQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: validationMessage(query.error) });
      return;
    }
    if (!runtime.reports.channels().includes(channelId)) {
      res.status(404).json({ error: "Channel not found" });
      return;
    }
    try {
      res.json(await runtime.reports.analyze(channelId, query.data));
    } catch (error) {
      sendFailure(res, error, "Unable to build the channel report");
    }
  });

  app.post("/api/parse", (req: Request, res: Response) => {
    const body = ParseBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: validationMessage(body.error) });
      return;
    }
    const outcome = runtime.parser.parse(body.data.text);
    if (outcome.kind === "rejected") {
      res.status(422).json({ error: describeRejectReason(outcome.reason), reason: outcome.reason });
      return;
    }
    res.json({ signal: outcome.signal });
  });

  app.post("/api/messages", async (req: Request, res: Response) => {
    const body = MessageBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: validationMessage(body.error) });
      return;
    }
    const queue = runtime.queue;
    if (!queue) {
      res.status(503).json({ error: "No queue provider is configured" });
      return;
    }
    try {
      const outcome = await queue.push(body.data);
      res.status(202).json({ outcome });
    } catch (error) {
      if (error instanceof SourceNotStartedError) {
        res.status(503).json({ error: error.message });
        return;
      }
      sendFailure(res, error, "Unable to ingest message");
    }
  });

  app.post("/api/signals/:id/commands", async (req: Request, res: Response) => {
    const signalId = req.params.id ?? "";
    const body = CommandBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: validationMessage(body.error) });
      return;
    }
    if (!runtime.engine.getSignal(signalId)) {
      res.status(404).json({ error: "Signal not found" });
      return;
    }

    requestSequence += 1;
    const command: Command = {
      ...toIntent(body.data),
      targetSignalId: signalId,
      source: { channelId: "api", messageId: body.data.requestId ?? `${Date.now()}-${requestSequence}` },
    };
    try {
      const result = await runtime.pipeline.dispatchCommand(command);
      res.json(result);
    } catch (error) {
      sendFailure(res, error, describeError(error));
    }
  });

  return app;
}
