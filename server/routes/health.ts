import type { RequestHandler } from "express";
import { getEngine } from "../services/engine";

export const handleHealth: RequestHandler = (_req, res) => {
  const engine = getEngine();
  const topology = engine.topology.snapshot();
  return res.json({
    status: "ok",
    signals: engine.signals.stats(),
    topology: { version: topology.version, services: topology.services().length },
    ruleBaseVersion: engine.ranker.ruleBase().version,
    notifier: engine.notifier.id,
  });
};
