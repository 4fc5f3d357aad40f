import path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CORRELATION_CONFIG, loadEngineConfig } from "../config";

describe("loadEngineConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = loadEngineConfig({});

    expect(config.port).toBe(4000);
    expect(config.correlation).toEqual(DEFAULT_CORRELATION_CONFIG);
    expect(config.signals).toEqual({ retentionMs: 86_400_000, clockSkewToleranceMs: 120_000 });
    expect(config.incidents).toEqual({ ttlMs: 86_400_000, dataDir: undefined });
    expect(config.topologyFile).toBe(path.join(process.cwd(), "config", "topology.json"));
    expect(config.rulesFile).toBeUndefined();
    expect(config.notifier).toEqual({
      mode: "log",
      webhookUrl: undefined,
      deploymentHintUrl: undefined,
      timeoutMs: 8_000,
    });
  });

  it("parses overrides and falls back on invalid numbers", () => {
    const config = loadEngineConfig({
      PORT: "8080",
      CORRELATION_WINDOW_MS: "600000",
      CORRELATION_HOP_LIMIT: "0",
      CORRELATION_CANDIDATE_CAP: "-3",
      DEPLOYMENT_WINDOW_MS: "60000",
      DIAGNOSIS_BUDGET_MS: "120000",
      NOTIFIER_MODE: "WEBHOOK",
      NOTIFIER_WEBHOOK_URL: " http://hooks.test/incidents ",
      INCIDENT_STORE_DIR: "   ",
    });

    expect(config.port).toBe(8080);
    expect(config.correlation).toEqual({
      windowMs: 600_000,
      hopLimit: 0,
      candidateCap: 500,
      deploymentWindowMs: 600_000,
      debounceMs: 60_000,
      budgetMs: 60_000,
    });
    expect(config.notifier.mode).toBe("webhook");
    expect(config.notifier.webhookUrl).toBe("http://hooks.test/incidents");
    expect(config.incidents.dataDir).toBeUndefined();
  });
});
