import type { Incident } from "@shared/incident";
import type { Signal, SignalKind, SignalSeverity } from "@shared/signal";
import type { TopologyDocument } from "@shared/topology";

export const T0 = 1_700_000_000_000;
export const MINUTE = 60_000;

export interface SignalSeed {
  id: string;
  service: string;
  kind?: SignalKind;
  timestamp?: number;
  severity?: SignalSeverity;
  attributes?: Record<string, string>;
  numericValue?: number;
}

export function makeSignal(seed: SignalSeed): Signal {
  return {
    id: seed.id,
    service: seed.service,
    kind: seed.kind || "log",
    timestamp: seed.timestamp ?? T0,
    severity: seed.severity || "info",
    attributes: seed.attributes || {},
    ...(seed.numericValue !== undefined ? { numericValue: seed.numericValue } : {}),
  };
}

/** frontend -> cartservice -> redis-cart, frontend -> checkoutservice -> paymentservice */
export const SHOP_TOPOLOGY: TopologyDocument = {
  services: [
    {
      name: "frontend",
      criticality: "critical",
      dependencies: ["cartservice", "checkoutservice"],
    },
    { name: "cartservice", criticality: "high", dependencies: ["redis-cart"] },
    { name: "redis-cart", criticality: "high", dependencies: [] },
    { name: "checkoutservice", criticality: "critical", dependencies: ["paymentservice"] },
    { name: "paymentservice", criticality: "critical", dependencies: [] },
    { name: "adservice", criticality: "low", dependencies: [] },
  ],
};

export function makeIncident(trigger: Signal, candidates: Signal[] = []): Incident {
  return {
    id: "inc-test",
    service: trigger.service,
    triggerSignal: trigger,
    openedAt: trigger.timestamp,
    state: "open",
    criticality: "high",
    candidateSignals: candidates,
    rankedCauses: [],
    diagnosisStatus: "pending",
    notes: [],
    correlation: {
      neighborServices: [],
      windowStart: trigger.timestamp,
      windowEnd: trigger.timestamp,
      deploymentWindowStart: trigger.timestamp,
      truncated: false,
      droppedCount: 0,
    },
    timeline: [],
    updatedAt: trigger.timestamp,
  };
}
