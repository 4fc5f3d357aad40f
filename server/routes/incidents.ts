import type { RequestHandler } from "express";
import {
  INCIDENT_STATES,
  type CloseIncidentRequest,
  type IncidentState,
  type ListIncidentsQuery,
  type RecordMitigationRequest,
} from "@shared/incident";
import { getEngine } from "../services/engine";
import { sendError } from "./errorResponse";

function toInt(value: unknown, fallback: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return parsed;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function toState(value: unknown): IncidentState | undefined {
  return INCIDENT_STATES.find((state) => state === value);
}

function readCloseRequest(body: unknown): CloseIncidentRequest {
  if (!body || typeof body !== "object") return {};
  return {
    actor: "actor" in body ? optionalString(body.actor) : undefined,
    note: "note" in body ? optionalString(body.note) : undefined,
  };
}

function readMitigationRequest(body: unknown): RecordMitigationRequest {
  const close = readCloseRequest(body);
  const action =
    body && typeof body === "object" && "action" in body ? optionalString(body.action) : undefined;
  return { action: action || "", actor: close.actor };
}

export const handleTrigger: RequestHandler = async (req, res) => {
  try {
    const result = await getEngine().incidents.handleTrigger(req.body || {});
    console.log(
      `[${res.locals.requestId}] Trigger for ${result.incident.service} -> ${result.incident.id} (${result.incident.diagnosisStatus})`,
    );
    return res.status(201).json(result);
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleListIncidents: RequestHandler = async (req, res) => {
  try {
    const query: ListIncidentsQuery = {
      state: toState(req.query.state),
      service: optionalString(req.query.service),
      limit: toInt(req.query.limit, 50),
      offset: toInt(req.query.offset, 0),
    };

    const result = await getEngine().incidents.listIncidents(query);
    return res.json(result);
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleGetIncident: RequestHandler = async (req, res) => {
  try {
    const incident = await getEngine().incidents.getIncidentById(req.params.incidentId);
    return res.json({ incident });
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleGetIncidentReport: RequestHandler = async (req, res) => {
  try {
    const report = await getEngine().incidents.getReport(req.params.incidentId);
    return res.json({ report });
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleRecordMitigation: RequestHandler = async (req, res) => {
  try {
    const incident = await getEngine().incidents.recordMitigation(
      req.params.incidentId,
      readMitigationRequest(req.body),
    );
    return res.json({ incident });
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleResolveIncident: RequestHandler = async (req, res) => {
  try {
    const incident = await getEngine().incidents.resolve(
      req.params.incidentId,
      readCloseRequest(req.body),
    );
    return res.json({ incident });
  } catch (error) {
    return sendError(res, error);
  }
};

export const handleEscalateIncident: RequestHandler = async (req, res) => {
  try {
    const incident = await getEngine().incidents.escalate(
      req.params.incidentId,
      readCloseRequest(req.body),
    );
    return res.json({ incident });
  } catch (error) {
    return sendError(res, error);
  }
};
