import type { Incident } from "@shared/incident";
import { severityRank, type Signal } from "@shared/signal";
import type { CorrelationConfig } from "../config";
import { type WorkBudget, yieldCheckpoint } from "./budget";
import { CorrelationTimeoutError, UpstreamUnavailableError } from "./errors";
import type { SignalReader } from "./signalStore";
import type { TopologyReader, TopologySnapshot } from "./topology";

export type CorrelatorSettings = Pick<
  CorrelationConfig,
  "windowMs" | "hopLimit" | "candidateCap" | "deploymentWindowMs"
>;

export interface CorrelatorOptions {
  signals: SignalReader;
  topology: TopologyReader;
  settings: CorrelatorSettings;
}

function byTime(a: Signal, b: Signal): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Builds an incident's candidate signal set: the trigger service plus its topology
 * neighbours, windowed around the trigger, capped, with deployments always kept.
 */
export class Correlator {
  private readonly signals: SignalReader;
  private readonly topology: TopologyReader;
  readonly settings: CorrelatorSettings;

  constructor(options: CorrelatorOptions) {
    this.signals = options.signals;
    this.topology = options.topology;
    this.settings = options.settings;
  }

  /**
   * Populates `incident.candidateSignals` and `incident.correlation`. On timeout the
   * candidates gathered so far are kept; on an upstream failure none are.
   */
  async correlate(incident: Incident, budget: WorkBudget): Promise<TopologySnapshot> {
    const { windowMs, hopLimit, deploymentWindowMs } = this.settings;
    const trigger = incident.triggerSignal;
    const t = trigger.timestamp;
    const windowStart = t - windowMs;
    const deploymentWindowStart = t - Math.max(windowMs, deploymentWindowMs);

    incident.correlation = {
      neighborServices: [],
      windowStart,
      windowEnd: t,
      deploymentWindowStart,
      truncated: false,
      droppedCount: 0,
    };

    let topology: TopologySnapshot;
    try {
      topology = this.topology.snapshot();
    } catch (error) {
      throw new UpstreamUnavailableError("topology", error);
    }

    const neighbors = Array.from(topology.neighbors(incident.service, hopLimit)).sort();
    incident.correlation.topologyVersion = topology.version;
    incident.correlation.neighborServices = neighbors;

    const windowed: Signal[] = [];
    const deployments: Signal[] = [];

    try {
      for (const service of [incident.service, ...neighbors]) {
        await yieldCheckpoint(budget, `signal query for ${service}`);

        try {
          for (const signal of this.signals.query(service, undefined, {
            from: deploymentWindowStart,
            to: t,
          })) {
            if (signal.id === trigger.id) continue;
            if (signal.kind === "deployment") deployments.push(signal);
            else if (signal.timestamp >= windowStart) windowed.push(signal);
          }
        } catch (error) {
          throw new UpstreamUnavailableError("signal-store", error);
        }
      }
    } catch (error) {
      if (error instanceof CorrelationTimeoutError) {
        this.assemble(incident, windowed, deployments);
      }
      throw error;
    }

    this.assemble(incident, windowed, deployments);
    return topology;
  }

  private assemble(incident: Incident, windowed: Signal[], deployments: Signal[]): void {
    const t = incident.triggerSignal.timestamp;
    const room = Math.max(0, this.settings.candidateCap - deployments.length);
    let kept = windowed;

    if (windowed.length > room) {
      kept = [...windowed]
        .sort(
          (a, b) =>
            severityRank(b.severity) - severityRank(a.severity) ||
            Math.abs(t - a.timestamp) - Math.abs(t - b.timestamp) ||
            byTime(a, b),
        )
        .slice(0, room);
    }

    const droppedCount = windowed.length - kept.length;
    incident.candidateSignals = [...kept, ...deployments].sort(byTime);
    incident.correlation.truncated = droppedCount > 0;
    incident.correlation.droppedCount = droppedCount;

    if (droppedCount > 0) {
      console.warn(
        `[correlator] Incident ${incident.id}: kept ${kept.length} of ${windowed.length} windowed signal(s) plus ${deployments.length} deployment(s)`,
      );
    }
  }
}
