import { promises as fs } from "fs";
import type { Incident } from "@shared/incident";
import type {
  ConfidenceBreakdown,
  DiagnosisRuleId,
  RootCauseHypothesis,
  RuleBaseView,
  RuleOverridesDocument,
} from "@shared/rca";
import type { Signal } from "@shared/signal";
import { type WorkBudget, yieldCheckpoint } from "./budget";
import { CorrelationTimeoutError, RuleConfigError } from "./errors";
import {
  DEFAULT_LATENCY_THRESHOLD_MS,
  DEFAULT_METRIC_THRESHOLDS,
  DEFAULT_RULES,
  type DiagnosisRule,
  type RuleFacts,
  type RuleMatch,
} from "./rcaRules";
import { formatIssues, RuleOverridesSchema } from "./schemas";
import type { TopologySnapshot } from "./topology";

export interface DiagnosisContext {
  topology: TopologySnapshot;
  budget: WorkBudget;
  windowMs: number;
  deploymentWindowMs: number;
  hopLimit: number;
}

export interface DiagnosisOutcome {
  rankerId: string;
  ruleBaseVersion?: number;
  hypotheses: RootCauseHypothesis[];
}

/**
 * Maps an incident's candidates to ranked hypotheses. Implementations append to
 * `incident.rankedCauses` in rank order; on timeout they keep what they have ranked.
 */
export interface DiagnosisRanker {
  readonly id: string;
  diagnose(incident: Incident, context: DiagnosisContext): Promise<DiagnosisOutcome>;
}

interface ConfiguredRule {
  rule: DiagnosisRule;
  priority: number;
  enabled: boolean;
  baseWeight: number;
}

export interface RuleBase {
  readonly version: number;
  readonly rules: readonly ConfiguredRule[];
  readonly metricThresholds: Readonly<Record<string, number>>;
  readonly latencyThresholdMs: number;
}

const EVIDENCE_BONUS_PER_KIND = 0.05;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function latestTimestamp(signals: readonly Signal[]): number {
  return signals.reduce((latest, signal) => Math.max(latest, signal.timestamp), -Infinity);
}

export function scoreConfidence(
  baseWeight: number,
  supportingSignals: readonly Signal[],
  triggerTimestamp: number,
  horizonMs: number,
): ConfidenceBreakdown {
  const age = Math.max(0, triggerTimestamp - latestTimestamp(supportingSignals));
  const recency = horizonMs > 0 ? clamp01(1 - age / horizonMs) : 0;
  const evidenceKinds = new Set(supportingSignals.map((signal) => signal.kind)).size;
  const evidenceBonus = EVIDENCE_BONUS_PER_KIND * Math.max(0, evidenceKinds - 1);

  return {
    base: baseWeight,
    recency: round3(recency),
    evidenceKinds,
    evidenceBonus: round3(evidenceBonus),
    final: round3(clamp01(baseWeight * (0.6 + 0.4 * recency) + evidenceBonus)),
  };
}

/** Descending confidence, then rule priority, then the freshest supporting signal. */
export function compareHypotheses(
  priorities: ReadonlyMap<DiagnosisRuleId, number>,
): (a: RootCauseHypothesis, b: RootCauseHypothesis) => number {
  return (a, b) =>
    b.confidenceScore - a.confidenceScore ||
    (priorities.get(a.ruleId) ?? Number.MAX_SAFE_INTEGER) -
      (priorities.get(b.ruleId) ?? Number.MAX_SAFE_INTEGER) ||
    latestTimestamp(b.supportingSignals) - latestTimestamp(a.supportingSignals);
}

export function buildRuleBase(
  version: number,
  rules: readonly DiagnosisRule[] = DEFAULT_RULES,
  overrides: RuleOverridesDocument = {},
): RuleBase {
  return Object.freeze({
    version,
    rules: Object.freeze(
      rules.map((rule, priority) => {
        const override = overrides.rules?.[rule.id];
        return Object.freeze({
          rule,
          priority,
          enabled: override?.enabled ?? true,
          baseWeight: override?.baseWeight ?? rule.baseWeight,
        });
      }),
    ),
    metricThresholds: Object.freeze({
      ...DEFAULT_METRIC_THRESHOLDS,
      ...(overrides.metricThresholds || {}),
    }),
    latencyThresholdMs: overrides.latencyThresholdMs ?? DEFAULT_LATENCY_THRESHOLD_MS,
  });
}

function toHypothesis(
  configured: ConfiguredRule,
  match: RuleMatch,
  triggerTimestamp: number,
): RootCauseHypothesis {
  const breakdown = scoreConfidence(
    configured.baseWeight,
    match.supportingSignals,
    triggerTimestamp,
    match.horizonMs,
  );
  return Object.freeze({
    ruleId: configured.rule.id,
    title: configured.rule.title,
    explanation: match.explanation,
    confidenceScore: breakdown.final,
    supportingSignals: Object.freeze([...match.supportingSignals]),
    recommendedMitigation: match.recommendedMitigation,
    breakdown: Object.freeze(breakdown),
  });
}

interface RuleBasedRankerOptions {
  rules?: readonly DiagnosisRule[];
  overrides?: RuleOverridesDocument;
}

export class RuleBasedRanker implements DiagnosisRanker {
  readonly id = "rule-based";
  private readonly rules: readonly DiagnosisRule[];
  private current: RuleBase;

  constructor(options: RuleBasedRankerOptions = {}) {
    this.rules = options.rules || DEFAULT_RULES;
    this.current = buildRuleBase(1, this.rules, options.overrides);
  }

  ruleBase(): RuleBase {
    return this.current;
  }

  /** Replaces the whole rule base; diagnoses already running keep the one they started with. */
  reload(overrides: unknown): RuleBase {
    const parsed = RuleOverridesSchema.safeParse(overrides);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new RuleConfigError(`Invalid rule overrides: ${issues.join("; ")}`, issues);
    }

    this.current = buildRuleBase(this.current.version + 1, this.rules, parsed.data);
    console.log(`[rca] Rule base v${this.current.version} loaded`);
    return this.current;
  }

  async loadFile(filePath: string): Promise<RuleBase> {
    const raw = await fs.readFile(filePath, "utf8");
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new RuleConfigError(
        `Rule file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return this.reload(document);
  }

  view(): RuleBaseView {
    const ruleBase = this.current;
    return {
      version: ruleBase.version,
      rules: ruleBase.rules.map((configured) => ({
        id: configured.rule.id,
        priority: configured.priority,
        title: configured.rule.title,
        enabled: configured.enabled,
        baseWeight: configured.baseWeight,
      })),
      metricThresholds: { ...ruleBase.metricThresholds },
      latencyThresholdMs: ruleBase.latencyThresholdMs,
    };
  }

  async diagnose(incident: Incident, context: DiagnosisContext): Promise<DiagnosisOutcome> {
    const ruleBase = this.current;
    const priorities = new Map(
      ruleBase.rules.map((configured) => [configured.rule.id, configured.priority] as const),
    );
    const facts: RuleFacts = {
      service: incident.service,
      trigger: incident.triggerSignal,
      candidates: incident.candidateSignals,
      dependencies: context.topology.dependenciesOf(incident.service, context.hopLimit),
      windowMs: context.windowMs,
      deploymentWindowMs: Math.max(context.windowMs, context.deploymentWindowMs),
      metricThresholds: ruleBase.metricThresholds,
      latencyThresholdMs: ruleBase.latencyThresholdMs,
    };

    const hypotheses: RootCauseHypothesis[] = [];
    const publish = (): RootCauseHypothesis[] => {
      const ranked = [...hypotheses].sort(compareHypotheses(priorities));
      incident.rankedCauses.push(...ranked);
      return ranked;
    };

    try {
      for (const configured of ruleBase.rules) {
        if (!configured.enabled) continue;
        await yieldCheckpoint(context.budget, `rule ${configured.rule.id}`);

        const match = configured.rule.evaluate(facts);
        if (match && match.supportingSignals.length > 0) {
          hypotheses.push(toHypothesis(configured, match, incident.triggerSignal.timestamp));
        }
      }
    } catch (error) {
      if (error instanceof CorrelationTimeoutError) publish();
      throw error;
    }

    return {
      rankerId: this.id,
      ruleBaseVersion: ruleBase.version,
      hypotheses: publish(),
    };
  }
}
