import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import type { HandleTriggerResponse, IncidentReport, Incident, ListIncidentsResponse } from "@shared/incident";
import type { RuleBaseView } from "@shared/rca";
import type { IngestSignalsResponse, Signal } from "@shared/signal";
import type { NeighborsResponse, TopologyView } from "@shared/topology";
import { loadEngineConfig } from "../../config";
import { createServer } from "../../index";
import { createEngine, resetEngineForTests, setEngineForTests } from "../../services/engine";
import { MINUTE, SHOP_TOPOLOGY, T0 } from "../../services/__tests__/fixtures";

interface ErrorPayload {
  error: { code: string; message: string };
}

async function readBody<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

describe("Engine routes", () => {
  let tempDir: string;
  let baseUrl: string;
  let server: ReturnType<ReturnType<typeof createServer>["listen"]>;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    tempDir = await mkdtemp(path.join(os.tmpdir(), "engine-routes-"));
    setEngineForTests(
      createEngine({
        config: loadEngineConfig({ INCIDENT_STORE_DIR: tempDir, NOTIFIER_MODE: "disabled" }),
        now: () => T0,
      }),
    );

    const app = createServer();
    server = app.listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Server did not bind to a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    resetEngineForTests();
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  function send(method: string, route: string, body?: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method,
      headers: { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("supports topology, signal, trigger and responder flow", async () => {
    const health = await send("GET", "/api/health");
    expect(health.status).toBe(200);
    expect(health.headers.get("x-request-id")).toBeTruthy();
    expect(await readBody<{ status: string }>(health)).toMatchObject({ status: "ok", notifier: "disabled" });

    const topologyResponse = await send("PUT", "/api/topology", SHOP_TOPOLOGY);
    expect(topologyResponse.status).toBe(200);
    const topologyPayload = await readBody<{ topology: TopologyView }>(topologyResponse);
    expect(topologyPayload.topology.version).toBe(1);

    const neighbors = await send("GET", "/api/topology/cartservice/neighbors?hops=1");
    expect(await readBody<NeighborsResponse>(neighbors)).toEqual({
      service: "cartservice",
      hops: 1,
      version: 1,
      neighbors: ["frontend", "redis-cart"],
    });

    const ingest = await send("POST", "/api/signals", {
      signals: [
        {
          id: "deploy-1",
          service: "cartservice",
          kind: "deployment",
          timestamp: T0 - 10 * MINUTE,
          attributes: { version: "2.3.0", commit: "abc123", repository: "shop/cartservice" },
        },
        {
          id: "err-1",
          service: "cartservice",
          kind: "log",
          timestamp: T0 - 5 * MINUTE,
          severity: "high",
          attributes: { message: "NullPointerException in AddItem" },
        },
        { id: "bad-1", service: "cartservice", kind: "profile", timestamp: T0 },
      ],
    });
    expect(ingest.status).toBe(202);
    const ingestPayload = await readBody<IngestSignalsResponse>(ingest);
    expect(ingestPayload.accepted).toBe(2);
    expect(ingestPayload.duplicates).toBe(0);
    expect(ingestPayload.rejected).toHaveLength(1);
    expect(ingestPayload.rejected[0]).toMatchObject({ index: 2, id: "bad-1" });

    const query = await send(
      "GET",
      `/api/signals?service=cartservice&kind=deployment&from=${T0 - 60 * MINUTE}&to=${T0}`,
    );
    const queryPayload = await readBody<{ signals: Signal[] }>(query);
    expect(queryPayload.signals.map((signal) => signal.id)).toEqual(["deploy-1"]);

    const defaultRange = await send("GET", "/api/signals?service=cartservice");
    expect(await readBody<{ from: number; to: number; signals: Signal[] }>(defaultRange)).toMatchObject({
      from: T0 - 30 * MINUTE,
      to: T0,
      signals: [{ id: "deploy-1" }, { id: "err-1" }],
    });

    const trigger = await send("POST", "/api/triggers", {
      service: "cartservice",
      severity: "high",
      metricName: "error_rate",
      value: 0.12,
    });
    expect(trigger.status).toBe(201);
    const triggerPayload = await readBody<HandleTriggerResponse>(trigger);
    const incidentId = triggerPayload.incident.id;
    expect(triggerPayload.incident.state).toBe("diagnosed");
    expect(triggerPayload.report.rankedCauses[0]).toMatchObject({
      rank: 1,
      ruleId: "deployment-regression",
      confidenceScore: 0.823,
    });

    const list = await send("GET", "/api/incidents?state=diagnosed");
    const listPayload = await readBody<ListIncidentsResponse>(list);
    expect(listPayload.total).toBe(1);
    expect(listPayload.items[0].id).toBe(incidentId);
    expect(listPayload.items[0].topRuleId).toBe("deployment-regression");

    const report = await send("GET", `/api/incidents/${incidentId}/report`);
    expect((await readBody<{ report: IncidentReport }>(report)).report.incidentId).toBe(incidentId);

    const mitigation = await send("POST", `/api/incidents/${incidentId}/mitigation`, {
      action: "Rolled back cartservice to 2.2.9",
      actor: "oncall",
    });
    expect(mitigation.status).toBe(200);
    expect((await readBody<{ incident: Incident }>(mitigation)).incident.state).toBe("mitigating");

    const resolved = await send("POST", `/api/incidents/${incidentId}/resolve`, {
      note: "Error rate back to baseline",
    });
    expect((await readBody<{ incident: Incident }>(resolved)).incident.state).toBe("resolved");

    const escalate = await send("POST", `/api/incidents/${incidentId}/escalate`, {});
    expect(escalate.status).toBe(409);
    expect((await readBody<ErrorPayload>(escalate)).error.code).toBe("INCIDENT_INVALID_TRANSITION");
  });

  it("maps validation and lookup failures to error responses", async () => {
    const badTopology = await send("PUT", "/api/topology", { services: "nope" });
    expect(badTopology.status).toBe(400);
    expect((await readBody<ErrorPayload>(badTopology)).error.code).toBe("TOPOLOGY_INVALID");

    const badSignals = await send("POST", "/api/signals", { signal: [] });
    expect(badSignals.status).toBe(400);

    const missingService = await send("GET", "/api/signals");
    expect(missingService.status).toBe(400);
    expect((await readBody<ErrorPayload>(missingService)).error.code).toBe("SIGNAL_QUERY_INVALID");

    const badTrigger = await send("POST", "/api/triggers", { severity: "high" });
    expect(badTrigger.status).toBe(400);
    expect((await readBody<ErrorPayload>(badTrigger)).error.code).toBe("INCIDENT_VALIDATION_ERROR");

    const missing = await send("GET", "/api/incidents/inc-missing");
    expect(missing.status).toBe(404);
    expect((await readBody<ErrorPayload>(missing)).error.code).toBe("INCIDENT_NOT_FOUND");

    const badHops = await send("GET", "/api/topology/cartservice/neighbors?hops=-1");
    expect(badHops.status).toBe(400);
  });

  it("reloads the diagnosis rule base", async () => {
    const initial = await send("GET", "/api/rules");
    const initialPayload = await readBody<{ ruleBase: RuleBaseView }>(initial);
    expect(initialPayload.ruleBase.version).toBe(1);
    expect(initialPayload.ruleBase.rules.map((rule) => rule.id)).toEqual([
      "deployment-regression",
      "dependency-outage",
      "resource-exhaustion",
      "dependency-latency",
      "organic-load",
    ]);

    const invalid = await send("PUT", "/api/rules", { latencyThresholdMs: -5 });
    expect(invalid.status).toBe(400);
    expect((await readBody<ErrorPayload>(invalid)).error.code).toBe("RULES_INVALID");

    const reloaded = await send("PUT", "/api/rules", {
      rules: { "organic-load": { enabled: false } },
      metricThresholds: { cpu_utilization: 80 },
    });
    const payload = await readBody<{ ruleBase: RuleBaseView }>(reloaded);
    expect(payload.ruleBase.version).toBe(2);
    expect(payload.ruleBase.metricThresholds.cpu_utilization).toBe(80);
    expect(payload.ruleBase.rules[4]).toMatchObject({ id: "organic-load", enabled: false });
  });
});
