import type { RequestHandler } from "express";
import type { NeighborsResponse } from "@shared/topology";
import { getEngine } from "../services/engine";
import { sendBadRequest, sendError } from "./errorResponse";

export const handleGetTopology: RequestHandler = (_req, res) => {
  return res.json({ topology: getEngine().topology.snapshot().toView() });
};

export const handleReloadTopology: RequestHandler = (req, res) => {
  try {
    const snapshot = getEngine().topology.reload(req.body);
    return res.json({ topology: snapshot.toView() });
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleGetNeighbors: RequestHandler = (req, res) => {
  const engine = getEngine();
  const hopsParam = req.query.hops;
  const hops =
    hopsParam === undefined ? engine.config.correlation.hopLimit : Number(hopsParam);
  if (!Number.isInteger(hops) || hops < 0) {
    return sendBadRequest(res, "TOPOLOGY_QUERY_INVALID", "hops must be a non-negative integer");
  }

  const snapshot = engine.topology.snapshot();
  const response: NeighborsResponse = {
    service: req.params.service,
    hops,
    version: snapshot.version,
    neighbors: Array.from(snapshot.neighbors(req.params.service, hops)).sort(),
  };
  return res.json(response);
};
