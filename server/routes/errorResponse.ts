import type { Response } from "express";
import {
  InvalidSignalError,
  RuleConfigError,
  TopologyValidationError,
  UnknownServiceError,
  UpstreamUnavailableError,
} from "../services/errors";
import { IncidentServiceError } from "../services/incidents";

interface MappedError {
  status: number;
  code: string;
  message: string;
  issues?: string[];
}

export function mapEngineError(error: unknown): MappedError {
  if (error instanceof IncidentServiceError) {
    if (error.code === "INCIDENT_NOT_FOUND") {
      return { status: 404, code: error.code, message: error.message };
    }
    if (error.code === "INCIDENT_VALIDATION_ERROR") {
      return { status: 400, code: error.code, message: error.message, issues: error.issues };
    }
    if (error.code === "INCIDENT_INVALID_TRANSITION") {
      return { status: 409, code: error.code, message: error.message };
    }
    return { status: 500, code: error.code, message: error.message };
  }

  if (
    error instanceof InvalidSignalError ||
    error instanceof TopologyValidationError ||
    error instanceof RuleConfigError
  ) {
    return { status: 400, code: error.code, message: error.message, issues: error.issues };
  }
  if (error instanceof UnknownServiceError) {
    return { status: 404, code: error.code, message: error.message };
  }
  if (error instanceof UpstreamUnavailableError) {
    return { status: 503, code: error.code, message: error.message };
  }

  return {
    status: 500,
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : "Unknown error",
  };
}

export function sendError(res: Response, error: unknown) {
  const mapped = mapEngineError(error);
  if (mapped.status >= 500) {
    console.error(`[${res.locals.requestId || "unknown"}] ${mapped.code}: ${mapped.message}`);
  }
  return res.status(mapped.status).json({
    error: {
      code: mapped.code,
      message: mapped.message,
      ...(mapped.issues && mapped.issues.length > 0 ? { issues: mapped.issues } : {}),
    },
  });
}

export function sendBadRequest(res: Response, code: string, message: string) {
  return res.status(400).json({ error: { code, message } });
}
