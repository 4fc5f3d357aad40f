import type { RequestHandler } from "express";
import { getEngine } from "../services/engine";
import { sendError } from "./errorResponse";

export const handleGetRules: RequestHandler = (_req, res) => {
  return res.json({ ruleBase: getEngine().ranker.view() });
};

export const handleReloadRules: RequestHandler = (req, res) => {
  try {
    const ranker = getEngine().ranker;
    ranker.reload(req.body || {});
    return res.json({ ruleBase: ranker.view() });
  } catch (error) {
    return sendError(res, error);
  }
};
