import type { DiagnosisRuleId } from "@shared/rca";
import { severityRank, type Signal } from "@shared/signal";

const CONNECTION_FAILURE_PATTERN =
  /connection refused|econnrefused|dial tcp|upstream connect error|no healthy upstream|connection reset|could not connect/;
const CRASH_PATTERN =
  /oomkilled|out of memory|crashloopbackoff|segmentation fault|panic:|exit code 137|container restarted|back-off restarting/;
const LATENCY_METRIC_PATTERN = /latency|duration|p9\d/;

export const DEFAULT_METRIC_THRESHOLDS: Readonly<Record<string, number>> = Object.freeze({
  cpu_utilization: 85,
  memory_utilization: 90,
  connection_pool_utilization: 90,
  request_queue_depth: 1000,
});
export const DEFAULT_LATENCY_THRESHOLD_MS = 1000;

/** Everything a rule may look at. Candidates are time-ordered and exclude the trigger. */
export interface RuleFacts {
  service: string;
  trigger: Signal;
  candidates: readonly Signal[];
  /** Downstream services of the trigger service within the hop limit. */
  dependencies: ReadonlySet<string>;
  windowMs: number;
  deploymentWindowMs: number;
  metricThresholds: Readonly<Record<string, number>>;
  latencyThresholdMs: number;
}

export interface RuleMatch {
  explanation: string;
  recommendedMitigation: string;
  supportingSignals: Signal[];
  /** Age at which a supporting signal no longer adds any recency. */
  horizonMs: number;
}

export interface DiagnosisRule {
  id: DiagnosisRuleId;
  title: string;
  baseWeight: number;
  evaluate(facts: RuleFacts): RuleMatch | null;
}

function signalText(signal: Signal): string {
  return Object.values(signal.attributes).join(" ").toLowerCase();
}

function isCrashSignal(signal: Signal): boolean {
  return signal.kind !== "deployment" && CRASH_PATTERN.test(signalText(signal));
}

function metricName(signal: Signal): string {
  return (signal.attributes.metric || signal.attributes.metricName || "").toLowerCase();
}

function minutesBetween(earlier: number, later: number): number {
  return Math.round((later - earlier) / 60_000);
}

function describeDeployment(signal: Signal): string {
  const version = signal.attributes.version || signal.attributes.commit;
  return version ? `${signal.service}@${version}` : signal.service;
}

function listServices(signals: readonly Signal[]): string {
  return Array.from(new Set(signals.map((signal) => signal.service))).sort().join(", ");
}

function isRelevantDeployment(facts: RuleFacts, signal: Signal): boolean {
  return (
    signal.kind === "deployment" &&
    (signal.service === facts.service || facts.dependencies.has(signal.service)) &&
    signal.timestamp <= facts.trigger.timestamp &&
    signal.timestamp >= facts.trigger.timestamp - facts.deploymentWindowMs
  );
}

function exceedsThreshold(signal: Signal, thresholds: Readonly<Record<string, number>>): boolean {
  if (signal.kind !== "metric" || signal.numericValue === undefined) return false;
  const explicit = Number(signal.attributes.threshold);
  if (signal.attributes.threshold !== undefined && Number.isFinite(explicit)) {
    return signal.numericValue >= explicit;
  }
  const configured = thresholds[metricName(signal)];
  return configured !== undefined && signal.numericValue >= configured;
}

const deploymentRegression: DiagnosisRule = {
  id: "deployment-regression",
  title: "Deployment regression",
  baseWeight: 0.8,
  evaluate(facts) {
    const deployments = facts.candidates.filter((signal) => isRelevantDeployment(facts, signal));
    if (deployments.length === 0) return null;

    const latest = deployments[deployments.length - 1];
    const earliest = deployments[0];
    const errorsAfterDeploy = facts.candidates.filter(
      (signal) =>
        signal.service === facts.service &&
        signal.kind !== "deployment" &&
        signal.kind !== "metric" &&
        severityRank(signal.severity) >= severityRank("high") &&
        signal.timestamp >= earliest.timestamp,
    );

    return {
      explanation:
        `Deployment ${describeDeployment(latest)} landed ${minutesBetween(latest.timestamp, facts.trigger.timestamp)} min before the alert on ${facts.service}` +
        (errorsAfterDeploy.length > 0
          ? `; ${errorsAfterDeploy.length} high-severity error signal(s) followed it.`
          : "."),
      recommendedMitigation: `Roll back ${describeDeployment(latest)} to the previous release and confirm ${facts.service} recovers.`,
      supportingSignals: [...deployments, ...errorsAfterDeploy],
      horizonMs: facts.deploymentWindowMs,
    };
  },
};

const dependencyOutage: DiagnosisRule = {
  id: "dependency-outage",
  title: "Dependency outage",
  baseWeight: 0.75,
  evaluate(facts) {
    const crashes = facts.candidates.filter(
      (signal) => facts.dependencies.has(signal.service) && isCrashSignal(signal),
    );
    if (crashes.length === 0) return null;

    const crashed = new Set(crashes.map((signal) => signal.service));
    const connectionFailures = facts.candidates.filter(
      (signal) =>
        (signal.kind === "log" || signal.kind === "trace") &&
        !crashed.has(signal.service) &&
        CONNECTION_FAILURE_PATTERN.test(signalText(signal)),
    );
    if (connectionFailures.length === 0) return null;

    const crashedList = listServices(crashes);
    return {
      explanation: `${crashedList} crashed or was OOM-killed while ${listServices(connectionFailures)} reported ${connectionFailures.length} connection failure(s).`,
      recommendedMitigation: `Restore ${crashedList}: restart or reschedule the failed instances, then verify ${facts.service} reconnects.`,
      supportingSignals: [...crashes, ...connectionFailures].sort(
        (a, b) => a.timestamp - b.timestamp,
      ),
      horizonMs: facts.windowMs,
    };
  },
};

const resourceExhaustion: DiagnosisRule = {
  id: "resource-exhaustion",
  title: "Resource exhaustion on the alerting service",
  baseWeight: 0.7,
  evaluate(facts) {
    const crashes = facts.candidates.filter(
      (signal) => signal.service === facts.service && isCrashSignal(signal),
    );
    if (crashes.length === 0) return null;

    return {
      explanation: `${facts.service} reported ${crashes.length} crash, restart or out-of-memory signal(s) in the window.`,
      recommendedMitigation: `Raise memory/CPU limits for ${facts.service}, restart the affected instances and check the latest build for leaks.`,
      supportingSignals: crashes,
      horizonMs: facts.windowMs,
    };
  },
};

const dependencyLatency: DiagnosisRule = {
  id: "dependency-latency",
  title: "Slow dependency",
  baseWeight: 0.6,
  evaluate(facts) {
    const slow = facts.candidates.filter((signal) => {
      if (!facts.dependencies.has(signal.service)) return false;
      if (signal.kind === "trace") {
        const duration = signal.numericValue ?? Number(signal.attributes.durationMs);
        return Number.isFinite(duration) && duration >= facts.latencyThresholdMs;
      }
      return signal.kind === "alarm" && LATENCY_METRIC_PATTERN.test(metricName(signal));
    });
    if (slow.length === 0) return null;

    const slowList = listServices(slow);
    return {
      explanation: `${slowList} showed ${slow.length} slow span(s) or latency alarm(s) above ${facts.latencyThresholdMs} ms.`,
      recommendedMitigation: `Shed load or tighten timeouts and circuit breakers on calls from ${facts.service} to ${slowList}.`,
      supportingSignals: slow,
      horizonMs: facts.windowMs,
    };
  },
};

const organicLoad: DiagnosisRule = {
  id: "organic-load",
  title: "Organic load / capacity",
  baseWeight: 0.55,
  evaluate(facts) {
    if (facts.candidates.some((signal) => isRelevantDeployment(facts, signal))) return null;

    const saturated = facts.candidates.filter(
      (signal) =>
        (signal.service === facts.service || facts.dependencies.has(signal.service)) &&
        exceedsThreshold(signal, facts.metricThresholds),
    );
    if (saturated.length === 0) return null;

    const metrics = Array.from(new Set(saturated.map(metricName).filter(Boolean))).sort();
    return {
      explanation: `${listServices(saturated)} exceeded capacity thresholds (${metrics.join(", ") || "metric"}) with no recent deployment.`,
      recommendedMitigation: `Scale out ${listServices(saturated)} (replicas or autoscaling ceiling) and review capacity headroom.`,
      supportingSignals: saturated,
      horizonMs: facts.windowMs,
    };
  },
};

/** Evaluation order is priority order. */
export const DEFAULT_RULES: readonly DiagnosisRule[] = Object.freeze([
  deploymentRegression,
  dependencyOutage,
  resourceExhaustion,
  dependencyLatency,
  organicLoad,
]);
