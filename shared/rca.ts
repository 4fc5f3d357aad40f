import type { Signal } from "./signal";

export const DIAGNOSIS_RULE_IDS = [
  "deployment-regression",
  "dependency-outage",
  "resource-exhaustion",
  "dependency-latency",
  "organic-load",
] as const;

export type DiagnosisRuleId = (typeof DIAGNOSIS_RULE_IDS)[number];

export interface ConfidenceBreakdown {
  base: number;
  /** 1 when the newest supporting signal coincides with the trigger, 0 at the horizon. */
  recency: number;
  evidenceKinds: number;
  evidenceBonus: number;
  final: number;
}

export interface RootCauseHypothesis {
  readonly ruleId: DiagnosisRuleId;
  readonly title: string;
  readonly explanation: string;
  readonly confidenceScore: number;
  readonly supportingSignals: readonly Signal[];
  readonly recommendedMitigation: string;
  readonly breakdown: ConfidenceBreakdown;
}

export interface RuleOverride {
  enabled?: boolean;
  baseWeight?: number;
}

export interface RuleOverridesDocument {
  rules?: Partial<Record<DiagnosisRuleId, RuleOverride>>;
  /** Metric name to threshold; a metric signal at or above it counts as saturated. */
  metricThresholds?: Record<string, number>;
  latencyThresholdMs?: number;
}

export interface RuleSummary {
  id: DiagnosisRuleId;
  priority: number;
  title: string;
  enabled: boolean;
  baseWeight: number;
}

export interface RuleBaseView {
  version: number;
  rules: RuleSummary[];
  metricThresholds: Record<string, number>;
  latencyThresholdMs: number;
}
