import { promises as fs } from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import type {
  CloseIncidentRequest,
  HandleTriggerResponse,
  Incident,
  IncidentReport,
  IncidentState,
  IncidentSummary,
  IncidentTimelineEvent,
  ListIncidentsQuery,
  ListIncidentsResponse,
  RecordMitigationRequest,
  TriggerRequest,
} from "@shared/incident";
import { severityRank, type Signal, type SignalSeverity } from "@shared/signal";
import type { ServiceCriticality } from "@shared/topology";
import { createWorkBudget, type WorkBudget } from "./budget";
import type { Correlator } from "./correlator";
import {
  CorrelationCancelledError,
  CorrelationTimeoutError,
  UnknownServiceError,
  UpstreamUnavailableError,
} from "./errors";
import { detachForDelivery, type IncidentNotifier, LogNotifier } from "./notifier";
import type { DiagnosisRanker } from "./rca";
import { buildDeploymentHint, buildIncidentReport } from "./report";
import { formatIssues, TriggerSchema } from "./schemas";
import { type TopologyReader, TopologySnapshot } from "./topology";

const INDEX_FILE = "index.json";
const DEFAULT_DEBOUNCE_MS = 60_000;
const DEFAULT_BUDGET_MS = 5_000;
const DEFAULT_INCIDENT_TTL_MS = 24 * 60 * 60_000;

const ALLOWED_STATE_TRANSITIONS: Record<IncidentState, IncidentState[]> = {
  open: ["diagnosed", "superseded", "resolved", "escalated"],
  diagnosed: ["mitigating", "resolved", "escalated"],
  mitigating: ["resolved", "escalated"],
  resolved: [],
  escalated: [],
  superseded: [],
};

const TERMINAL_STATES: ReadonlySet<IncidentState> = new Set(["resolved", "escalated", "superseded"]);

export class IncidentServiceError extends Error {
  code:
    | "INCIDENT_NOT_FOUND"
    | "INCIDENT_VALIDATION_ERROR"
    | "INCIDENT_INVALID_TRANSITION"
    | "INCIDENT_STORE_ERROR";
  issues: string[];

  constructor(code: IncidentServiceError["code"], message: string, issues: string[] = []) {
    super(message);
    this.code = code;
    this.issues = issues;
  }
}

interface IncidentStoreIndex {
  incidents: IncidentSummary[];
}

interface InFlightCorrelation {
  incidentId: string;
  service: string;
  severity: SignalSeverity;
  receivedAt: number;
  controller: AbortController;
  supersededBy?: string;
}

export interface IncidentServiceOptions {
  correlator: Correlator;
  ranker: DiagnosisRanker;
  topology: TopologyReader;
  notifier?: IncidentNotifier;
  debounceMs?: number;
  budgetMs?: number;
  incidentTtlMs?: number;
  dataDir?: string;
  now?: () => number;
}

function buildSummary(incident: Incident): IncidentSummary {
  return {
    id: incident.id,
    service: incident.service,
    state: incident.state,
    criticality: incident.criticality,
    severity: incident.triggerSignal.severity,
    diagnosisStatus: incident.diagnosisStatus,
    topRuleId: incident.rankedCauses[0]?.ruleId,
    openedAt: incident.openedAt,
    updatedAt: incident.updatedAt,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns incidents from trigger to closure: correlation, diagnosis, supersede/debounce,
 * the diagnosis budget, responder transitions and report delivery. Every accepted
 * trigger yields an incident record, however degraded.
 */
export class IncidentService {
  private readonly correlator: Correlator;
  private readonly ranker: DiagnosisRanker;
  private readonly topology: TopologyReader;
  private readonly notifier: IncidentNotifier;
  private readonly debounceMs: number;
  private readonly budgetMs: number;
  private readonly incidentTtlMs: number;
  private readonly dataDir?: string;
  private readonly now: () => number;
  private readonly incidents = new Map<string, Incident>();
  private readonly inFlight = new Map<string, InFlightCorrelation>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private initialization: Promise<void> | null = null;

  constructor(options: IncidentServiceOptions) {
    this.correlator = options.correlator;
    this.ranker = options.ranker;
    this.topology = options.topology;
    this.notifier = options.notifier || new LogNotifier();
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.budgetMs = options.budgetMs ?? DEFAULT_BUDGET_MS;
    this.incidentTtlMs = options.incidentTtlMs ?? DEFAULT_INCIDENT_TTL_MS;
    this.dataDir = options.dataDir;
    this.now = options.now || (() => Date.now());
  }

  /** Concurrent callers share one load so none of them runs ahead of it. A failed load is retried. */
  private ensureInitialized(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.loadFromDisk().catch((error: unknown) => {
        this.initialization = null;
        throw new IncidentServiceError("INCIDENT_STORE_ERROR", errorMessage(error));
      });
    }
    return this.initialization;
  }

  private async loadFromDisk(): Promise<void> {
    if (!this.dataDir) return;

    await fs.mkdir(this.dataDir, { recursive: true });
    const indexPath = path.join(this.dataDir, INDEX_FILE);

    let index: IncidentStoreIndex;
    try {
      index = JSON.parse(await fs.readFile(indexPath, "utf8")) as IncidentStoreIndex;
    } catch (error) {
      console.log(`[incidents] No readable index at ${indexPath} (${errorMessage(error)}); starting empty`);
      return;
    }

    for (const summary of index.incidents || []) {
      const incidentPath = path.join(this.dataDir, `${summary.id}.json`);
      try {
        const incident = JSON.parse(await fs.readFile(incidentPath, "utf8")) as Incident;
        this.incidents.set(incident.id, incident);
      } catch (error) {
        console.warn(`[incidents] Skipping unreadable incident ${summary.id}: ${errorMessage(error)}`);
      }
    }
  }

  private async persist(incident: Incident): Promise<void> {
    this.incidents.set(incident.id, incident);
    if (!this.dataDir) return;

    try {
      await fs.writeFile(
        path.join(this.dataDir, `${incident.id}.json`),
        JSON.stringify(incident, null, 2),
        "utf8",
      );
      const summaries = Array.from(this.incidents.values())
        .map(buildSummary)
        .sort((a, b) => b.updatedAt - a.updatedAt);
      const payload: IncidentStoreIndex = { incidents: summaries };
      await fs.writeFile(path.join(this.dataDir, INDEX_FILE), JSON.stringify(payload, null, 2), "utf8");
    } catch (error) {
      throw new IncidentServiceError("INCIDENT_STORE_ERROR", errorMessage(error));
    }
  }

  private pushTimeline(
    incident: Incident,
    event: Omit<IncidentTimelineEvent, "id" | "timestamp">,
  ): void {
    incident.timeline.push({
      id: uuidv4(),
      timestamp: this.now(),
      ...event,
    });
    incident.updatedAt = this.now();
  }

  private addNote(incident: Incident, note: string, actor = "pipeline"): void {
    incident.notes.push(note);
    this.pushTimeline(incident, { type: "note", actor, message: note });
  }

  private assertTransition(current: IncidentState, next: IncidentState): void {
    if (!ALLOWED_STATE_TRANSITIONS[current].includes(next)) {
      throw new IncidentServiceError(
        "INCIDENT_INVALID_TRANSITION",
        `Invalid state transition: ${current} -> ${next}`,
      );
    }
  }

  private transition(incident: Incident, next: IncidentState, actor: string): void {
    this.assertTransition(incident.state, next);
    const previous = incident.state;
    incident.state = next;
    if (TERMINAL_STATES.has(next)) incident.closedAt = this.now();
    this.pushTimeline(incident, {
      type: "status",
      actor,
      message: `State changed: ${previous} -> ${next}`,
      payload: { previous, next },
    });
  }

  private resolveCriticality(service: string): { criticality: ServiceCriticality; note?: string } {
    try {
      return { criticality: this.topology.snapshot().criticality(service) };
    } catch (error) {
      if (error instanceof UnknownServiceError) {
        return {
          criticality: "low",
          note: `${service} is not registered in the topology; handled as lowest priority.`,
        };
      }
      return {
        criticality: "low",
        note: `Topology unavailable while resolving criticality: ${errorMessage(error)}`,
      };
    }
  }

  private openIncident(triggerSignal: Signal, receivedAt: number): Incident {
    const { criticality, note } = this.resolveCriticality(triggerSignal.service);
    const incident: Incident = {
      id: `inc-${uuidv4()}`,
      service: triggerSignal.service,
      triggerSignal,
      openedAt: receivedAt,
      state: "open",
      criticality,
      candidateSignals: [],
      rankedCauses: [],
      diagnosisStatus: "pending",
      notes: [],
      correlation: {
        neighborServices: [],
        windowStart: triggerSignal.timestamp,
        windowEnd: triggerSignal.timestamp,
        deploymentWindowStart: triggerSignal.timestamp,
        truncated: false,
        droppedCount: 0,
      },
      timeline: [],
      updatedAt: receivedAt,
    };

    this.pushTimeline(incident, {
      type: "intake",
      actor: "alerting",
      message: `Incident opened for ${incident.service} (${triggerSignal.severity})`,
      payload: { triggerId: triggerSignal.id, criticality },
    });
    if (note) this.addNote(incident, note);
    this.incidents.set(incident.id, incident);
    return incident;
  }

  /** A strictly more severe trigger inside the debounce window cancels older in-flight work. */
  private supersedeInFlight(incident: Incident, receivedAt: number): void {
    const severity = incident.triggerSignal.severity;
    for (const entry of this.inFlight.values()) {
      if (entry.service !== incident.service || entry.supersededBy) continue;
      if (receivedAt - entry.receivedAt > this.debounceMs) continue;
      if (severityRank(severity) <= severityRank(entry.severity)) continue;

      entry.supersededBy = incident.id;
      entry.controller.abort(`Superseded by ${incident.id}`);
      console.log(`[incidents] ${entry.incidentId} superseded by ${incident.id} (${severity})`);
    }
  }

  private markSuperseded(incident: Incident, supersededBy: string | undefined, reason: string): void {
    incident.candidateSignals = [];
    incident.rankedCauses = [];
    incident.diagnosisStatus = "empty";
    incident.supersededBy = supersededBy;
    this.addNote(incident, `Correlation discarded: ${reason}`);
    this.transition(incident, "superseded", "pipeline");
  }

  private markPartial(incident: Incident, error: CorrelationTimeoutError): void {
    incident.diagnosisStatus = "partial";
    this.addNote(incident, `${error.message}; reporting partial results.`);
    console.warn(`[incidents] ${incident.id}: ${error.message}`);
  }

  private async runPipeline(incident: Incident, budget: WorkBudget, entry: InFlightCorrelation): Promise<void> {
    let topology = TopologySnapshot.empty();
    let upstreamFailed = false;

    try {
      topology = await this.correlator.correlate(incident, budget);
      this.pushTimeline(incident, {
        type: "correlation",
        actor: "correlator",
        message: `Correlated ${incident.candidateSignals.length} candidate signal(s) across ${incident.correlation.neighborServices.length + 1} service(s)`,
        payload: {
          topologyVersion: incident.correlation.topologyVersion,
          truncated: incident.correlation.truncated,
          droppedCount: incident.correlation.droppedCount,
        },
      });
    } catch (error) {
      if (error instanceof CorrelationCancelledError) {
        this.markSuperseded(incident, entry.supersededBy, error.message);
        return;
      }
      if (error instanceof CorrelationTimeoutError) {
        this.markPartial(incident, error);
        this.transition(incident, "diagnosed", "pipeline");
        return;
      }

      upstreamFailed = true;
      incident.candidateSignals = [];
      const message =
        error instanceof UpstreamUnavailableError
          ? `${error.message}; incident opened without correlated evidence.`
          : `Correlation failed unexpectedly: ${errorMessage(error)}`;
      this.addNote(incident, message);
      console.error(`[incidents] ${incident.id}: ${message}`);
    }

    try {
      const outcome = await this.ranker.diagnose(incident, {
        topology,
        budget,
        windowMs: this.correlator.settings.windowMs,
        deploymentWindowMs: this.correlator.settings.deploymentWindowMs,
        hopLimit: this.correlator.settings.hopLimit,
      });
      incident.diagnosisStatus = upstreamFailed
        ? "failed"
        : outcome.hypotheses.length > 0
          ? "complete"
          : "empty";
      this.pushTimeline(incident, {
        type: "diagnosis",
        actor: outcome.rankerId,
        message:
          outcome.hypotheses.length > 0
            ? `Ranked ${outcome.hypotheses.length} hypothesis(es); top: ${outcome.hypotheses[0].ruleId}`
            : "No rule matched the candidate signals",
        payload: { ruleBaseVersion: outcome.ruleBaseVersion },
      });
    } catch (error) {
      if (error instanceof CorrelationCancelledError) {
        this.markSuperseded(incident, entry.supersededBy, error.message);
        return;
      }
      if (error instanceof CorrelationTimeoutError) {
        this.markPartial(incident, error);
      } else {
        incident.diagnosisStatus = "failed";
        this.addNote(incident, `Diagnosis failed: ${errorMessage(error)}`);
        console.error(`[incidents] ${incident.id}: diagnosis failed`, error);
      }
    }

    this.transition(incident, "diagnosed", "pipeline");
  }

  private async deliver(incident: Incident): Promise<IncidentReport> {
    const report = buildIncidentReport(incident, this.now());
    if (incident.state === "superseded") return report;

    const hint = buildDeploymentHint(incident);
    try {
      await this.notifier.notify(detachForDelivery(report), hint ? detachForDelivery(hint) : null);
      this.pushTimeline(incident, {
        type: "notify",
        actor: this.notifier.id,
        message: hint
          ? `Report and deployment hint delivered (${hint.repository}@${hint.commit})`
          : "Report delivered",
      });
    } catch (error) {
      this.pushTimeline(incident, {
        type: "notify",
        actor: this.notifier.id,
        message: `Report delivery failed: ${errorMessage(error)}`,
      });
      console.error(`[notifier] Delivery failed for ${incident.id}: ${errorMessage(error)}`);
    }
    return report;
  }

  async handleTrigger(input: unknown): Promise<HandleTriggerResponse> {
    let storeFailure: string | null = null;
    try {
      await this.ensureInitialized();
    } catch (error) {
      storeFailure = errorMessage(error);
    }

    const parsed = TriggerSchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new IncidentServiceError(
        "INCIDENT_VALIDATION_ERROR",
        `Invalid trigger: ${issues.join("; ")}`,
        issues,
      );
    }

    const trigger: TriggerRequest = parsed.data;
    const receivedAt = this.now();
    const attributes: Record<string, string> = { source: "trigger" };
    if (trigger.metricName) attributes.metricName = trigger.metricName;
    if (trigger.alarmId) attributes.alarmId = trigger.alarmId;

    const triggerSignal: Signal = Object.freeze({
      id: `trg-${uuidv4()}`,
      service: trigger.service,
      kind: "alarm" as const,
      timestamp: trigger.timestamp ?? receivedAt,
      severity: trigger.severity,
      attributes: Object.freeze(attributes),
      ...(trigger.value !== undefined ? { numericValue: trigger.value } : {}),
    });

    const incident = this.openIncident(triggerSignal, receivedAt);
    if (storeFailure) {
      this.addNote(incident, `Incident store unavailable: ${storeFailure}; incident kept in memory only.`);
      console.error(`[incidents] ${incident.id}: incident store unavailable: ${storeFailure}`);
    }
    this.supersedeInFlight(incident, receivedAt);

    const controller = new AbortController();
    const entry: InFlightCorrelation = {
      incidentId: incident.id,
      service: incident.service,
      severity: triggerSignal.severity,
      receivedAt,
      controller,
    };
    this.inFlight.set(incident.id, entry);

    try {
      await this.runPipeline(
        incident,
        createWorkBudget(receivedAt, this.budgetMs, this.now, controller.signal),
        entry,
      );
    } finally {
      this.inFlight.delete(incident.id);
    }

    const report = await this.deliver(incident);
    if (storeFailure) return { incident, report };

    try {
      await this.persist(incident);
    } catch (error) {
      if (!(error instanceof IncidentServiceError) || error.code !== "INCIDENT_STORE_ERROR") throw error;
      this.addNote(incident, `Incident store write failed: ${error.message}; incident kept in memory only.`);
      console.error(`[incidents] ${incident.id}: incident store write failed: ${error.message}`);
    }
    return { incident, report };
  }

  async listIncidents(query: ListIncidentsQuery = {}): Promise<ListIncidentsResponse> {
    await this.ensureInitialized();

    let incidents = Array.from(this.incidents.values());
    if (query.state) incidents = incidents.filter((item) => item.state === query.state);
    if (query.service) incidents = incidents.filter((item) => item.service === query.service);

    incidents.sort((a, b) => b.updatedAt - a.updatedAt);

    const total = incidents.length;
    const offset = Math.max(0, query.offset || 0);
    const limit = Math.max(1, Math.min(query.limit || 50, 200));

    return {
      items: incidents.slice(offset, offset + limit).map(buildSummary),
      total,
    };
  }

  async getIncidentById(incidentId: string): Promise<Incident> {
    await this.ensureInitialized();
    const incident = this.incidents.get(incidentId);
    if (!incident) {
      throw new IncidentServiceError("INCIDENT_NOT_FOUND", `Incident not found: ${incidentId}`);
    }
    return incident;
  }

  async getReport(incidentId: string): Promise<IncidentReport> {
    return buildIncidentReport(await this.getIncidentById(incidentId), this.now());
  }

  async recordMitigation(incidentId: string, payload: RecordMitigationRequest): Promise<Incident> {
    const incident = await this.getIncidentById(incidentId);
    const action = payload.action?.trim();
    if (!action) {
      throw new IncidentServiceError("INCIDENT_VALIDATION_ERROR", "action is required");
    }

    const actor = payload.actor?.trim() || "responder";
    this.transition(incident, "mitigating", actor);
    incident.mitigation = { action, actor, recordedAt: this.now() };
    this.pushTimeline(incident, {
      type: "note",
      actor,
      message: `Mitigation recorded: ${action}`,
    });

    await this.persist(incident);
    return incident;
  }

  private async close(
    incidentId: string,
    next: "resolved" | "escalated",
    payload: CloseIncidentRequest,
  ): Promise<Incident> {
    const incident = await this.getIncidentById(incidentId);
    const actor = payload.actor?.trim() || "responder";
    this.transition(incident, next, actor);
    const note = payload.note?.trim();
    if (note) this.addNote(incident, note, actor);

    await this.persist(incident);
    return incident;
  }

  resolve(incidentId: string, payload: CloseIncidentRequest = {}): Promise<Incident> {
    return this.close(incidentId, "resolved", payload);
  }

  escalate(incidentId: string, payload: CloseIncidentRequest = {}): Promise<Incident> {
    return this.close(incidentId, "escalated", payload);
  }

  /** Resolves incidents left open past the TTL. */
  async closeStale(now = this.now()): Promise<number> {
    await this.ensureInitialized();
    const stale = Array.from(this.incidents.values()).filter(
      (incident) =>
        !TERMINAL_STATES.has(incident.state) &&
        !this.inFlight.has(incident.id) &&
        now - incident.openedAt > this.incidentTtlMs,
    );

    for (const incident of stale) {
      this.addNote(
        incident,
        `Auto-closed after ${Math.round(this.incidentTtlMs / 60_000)} min without resolution.`,
        "sweeper",
      );
      this.transition(incident, "resolved", "sweeper");
      await this.persist(incident);
    }

    if (stale.length > 0) {
      console.log(`[incidents] Auto-closed ${stale.length} stale incident(s)`);
    }
    return stale.length;
  }

  start(sweepIntervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.closeStale().catch((error: unknown) => {
        console.error(`[incidents] Stale sweep failed: ${errorMessage(error)}`);
      });
    }, sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }
}
