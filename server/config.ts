import path from "path";

export type NotifierMode = "log" | "webhook" | "disabled";

export interface CorrelationConfig {
  windowMs: number;
  hopLimit: number;
  candidateCap: number;
  deploymentWindowMs: number;
  debounceMs: number;
  budgetMs: number;
}

export interface EngineConfig {
  port: number;
  correlation: CorrelationConfig;
  signals: {
    retentionMs: number;
    clockSkewToleranceMs: number;
  };
  sweepIntervalMs: number;
  incidents: {
    ttlMs: number;
    dataDir?: string;
  };
  topologyFile: string;
  rulesFile?: string;
  notifier: {
    mode: NotifierMode;
    webhookUrl?: string;
    deploymentHintUrl?: string;
    timeoutMs: number;
  };
}

export const DEFAULT_CORRELATION_CONFIG: CorrelationConfig = {
  windowMs: 30 * 60_000,
  hopLimit: 2,
  candidateCap: 500,
  deploymentWindowMs: 60 * 60_000,
  debounceMs: 60_000,
  budgetMs: 5_000,
};

function parsePositive(value: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.min(Math.floor(parsed), max);
}

function parseNonNegative(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function parseNotifierMode(value: string | undefined): NotifierMode {
  const normalized = (value || "log").trim().toLowerCase();
  if (normalized === "log" || normalized === "webhook" || normalized === "disabled") {
    return normalized;
  }
  return "log";
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed || undefined;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const windowMs = parsePositive(env.CORRELATION_WINDOW_MS, DEFAULT_CORRELATION_CONFIG.windowMs);

  return {
    port: parsePositive(env.PORT, 4000, 65_535),
    correlation: {
      windowMs,
      hopLimit: parseNonNegative(env.CORRELATION_HOP_LIMIT, DEFAULT_CORRELATION_CONFIG.hopLimit),
      candidateCap: parsePositive(
        env.CORRELATION_CANDIDATE_CAP,
        DEFAULT_CORRELATION_CONFIG.candidateCap,
      ),
      // The deployment window never shrinks below the correlation window.
      deploymentWindowMs: Math.max(
        windowMs,
        parsePositive(env.DEPLOYMENT_WINDOW_MS, DEFAULT_CORRELATION_CONFIG.deploymentWindowMs),
      ),
      debounceMs: parseNonNegative(env.TRIGGER_DEBOUNCE_MS, DEFAULT_CORRELATION_CONFIG.debounceMs),
      budgetMs: parsePositive(env.DIAGNOSIS_BUDGET_MS, DEFAULT_CORRELATION_CONFIG.budgetMs, 60_000),
    },
    signals: {
      retentionMs: parsePositive(env.SIGNAL_RETENTION_MS, 24 * 60 * 60_000),
      clockSkewToleranceMs: parseNonNegative(env.SIGNAL_CLOCK_SKEW_MS, 2 * 60_000),
    },
    sweepIntervalMs: parsePositive(env.SWEEP_INTERVAL_MS, 60_000),
    incidents: {
      ttlMs: parsePositive(env.INCIDENT_TTL_MS, 24 * 60 * 60_000),
      dataDir: optionalString(env.INCIDENT_STORE_DIR),
    },
    topologyFile:
      optionalString(env.TOPOLOGY_FILE) || path.join(process.cwd(), "config", "topology.json"),
    rulesFile: optionalString(env.DIAGNOSIS_RULES_FILE),
    notifier: {
      mode: parseNotifierMode(env.NOTIFIER_MODE),
      webhookUrl: optionalString(env.NOTIFIER_WEBHOOK_URL),
      deploymentHintUrl: optionalString(env.DEPLOYMENT_HINT_WEBHOOK_URL),
      timeoutMs: parsePositive(env.NOTIFIER_TIMEOUT_MS, 8_000, 60_000),
    },
  };
}
