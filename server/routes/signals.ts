import type { RequestHandler } from "express";
import { SIGNAL_KINDS, type SignalKind } from "@shared/signal";
import { getEngine } from "../services/engine";
import { sendBadRequest, sendError } from "./errorResponse";

function isSignalKind(value: string): value is SignalKind {
  return SIGNAL_KINDS.some((kind) => kind === value);
}

function parseTime(value: unknown, fallback: number): number | null {
  if (value === undefined || value === "") return fallback;
  if (typeof value !== "string") return null;
  const numeric = Number(value);
  if (Number.isFinite(numeric)) return numeric;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export const handleIngestSignals: RequestHandler = (req, res) => {
  const body: unknown = req.body;
  const signals =
    body && typeof body === "object" && "signals" in body ? body.signals : undefined;
  if (!Array.isArray(signals)) {
    return sendBadRequest(res, "SIGNAL_INVALID", "Body must be { signals: Signal[] }");
  }

  try {
    const result = getEngine().signals.ingestBatch(signals);
    return res.status(202).json(result);
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleQuerySignals: RequestHandler = (req, res) => {
  const engine = getEngine();
  const service = typeof req.query.service === "string" ? req.query.service.trim() : "";
  if (!service) {
    return sendBadRequest(res, "SIGNAL_QUERY_INVALID", "service is required");
  }

  const kinds: SignalKind[] = [];
  if (typeof req.query.kind === "string" && req.query.kind.trim()) {
    for (const kind of req.query.kind.split(",").map((value) => value.trim())) {
      if (!isSignalKind(kind)) {
        return sendBadRequest(res, "SIGNAL_QUERY_INVALID", `Unknown signal kind: ${kind}`);
      }
      kinds.push(kind);
    }
  }

  const to = parseTime(req.query.to, engine.now());
  const from = to === null ? null : parseTime(req.query.from, to - engine.config.correlation.windowMs);
  if (from === null || to === null) {
    return sendBadRequest(res, "SIGNAL_QUERY_INVALID", "from/to must be epoch ms or ISO timestamps");
  }

  try {
    const signals = Array.from(engine.signals.query(service, kinds, { from, to }));
    return res.json({ service, from, to, signals });
  } catch (error) {
    return sendError(res, error);
  }
};
