import type { DiagnosisRuleId, RootCauseHypothesis } from "./rca";
import type { Signal, SignalSeverity } from "./signal";
import type { ServiceCriticality } from "./topology";

export const INCIDENT_STATES = [
  "open",
  "diagnosed",
  "mitigating",
  "resolved",
  "escalated",
  "superseded",
] as const;
export type IncidentState = (typeof INCIDENT_STATES)[number];

export type DiagnosisStatus = "pending" | "complete" | "empty" | "partial" | "failed";

export type IncidentTimelineEventType =
  | "intake"
  | "correlation"
  | "diagnosis"
  | "status"
  | "notify"
  | "note";

export interface IncidentTimelineEvent {
  id: string;
  timestamp: number;
  type: IncidentTimelineEventType;
  actor: string;
  message: string;
  payload?: Record<string, unknown>;
}

export interface IncidentCorrelation {
  topologyVersion?: number;
  neighborServices: string[];
  windowStart: number;
  windowEnd: number;
  deploymentWindowStart: number;
  truncated: boolean;
  droppedCount: number;
}

export interface IncidentMitigation {
  action: string;
  actor: string;
  recordedAt: number;
}

export interface Incident {
  id: string;
  service: string;
  triggerSignal: Signal;
  openedAt: number;
  closedAt?: number;
  state: IncidentState;
  criticality: ServiceCriticality;
  candidateSignals: Signal[];
  rankedCauses: RootCauseHypothesis[];
  diagnosisStatus: DiagnosisStatus;
  notes: string[];
  correlation: IncidentCorrelation;
  mitigation?: IncidentMitigation;
  supersededBy?: string;
  timeline: IncidentTimelineEvent[];
  updatedAt: number;
}

export interface IncidentSummary {
  id: string;
  service: string;
  state: IncidentState;
  criticality: ServiceCriticality;
  severity: SignalSeverity;
  diagnosisStatus: DiagnosisStatus;
  topRuleId?: DiagnosisRuleId;
  openedAt: number;
  updatedAt: number;
}

/** Inbound alert from the alerting collaborator. */
export interface TriggerRequest {
  service: string;
  timestamp?: number;
  severity: SignalSeverity;
  metricName?: string;
  value?: number;
  alarmId?: string;
}

export interface RecordMitigationRequest {
  action: string;
  actor?: string;
}

export interface CloseIncidentRequest {
  actor?: string;
  note?: string;
}

export interface ListIncidentsQuery {
  state?: IncidentState;
  service?: string;
  limit?: number;
  offset?: number;
}

export interface ListIncidentsResponse {
  items: IncidentSummary[];
  total: number;
}

export interface ReportedCause {
  rank: number;
  ruleId: DiagnosisRuleId;
  title: string;
  explanation: string;
  confidenceScore: number;
  recommendedMitigation: string;
  supportingSignalIds: string[];
}

export interface IncidentReport {
  incidentId: string;
  service: string;
  state: IncidentState;
  triggerSummary: string;
  rankedCauses: ReportedCause[];
  recommendedMitigations: string[];
  candidateSignalCount: number;
  diagnosisStatus: DiagnosisStatus;
  diagnosisSummary: string;
  notes: string[];
  generatedAt: number;
}

export interface DeploymentCorrelationHint {
  commit: string;
  repository: string;
  service: string;
}

export interface HandleTriggerResponse {
  incident: Incident;
  report: IncidentReport;
}
