import { existsSync } from "fs";
import { type EngineConfig, loadEngineConfig } from "../config";
import { Correlator } from "./correlator";
import { IncidentService } from "./incidents";
import { createNotifier, type IncidentNotifier } from "./notifier";
import { RuleBasedRanker } from "./rca";
import { SignalStore } from "./signalStore";
import { TopologyModel } from "./topology";

export interface Engine {
  config: EngineConfig;
  signals: SignalStore;
  topology: TopologyModel;
  ranker: RuleBasedRanker;
  correlator: Correlator;
  notifier: IncidentNotifier;
  incidents: IncidentService;
  now: () => number;
}

export interface CreateEngineOptions {
  config?: EngineConfig;
  notifier?: IncidentNotifier;
  now?: () => number;
}

export function createEngine(options: CreateEngineOptions = {}): Engine {
  const config = options.config || loadEngineConfig();
  const now = options.now || (() => Date.now());

  const signals = new SignalStore({
    retentionMs: config.signals.retentionMs,
    clockSkewToleranceMs: config.signals.clockSkewToleranceMs,
    now,
  });
  const topology = new TopologyModel({ now });
  const ranker = new RuleBasedRanker();
  const correlator = new Correlator({
    signals,
    topology,
    settings: {
      windowMs: config.correlation.windowMs,
      hopLimit: config.correlation.hopLimit,
      candidateCap: config.correlation.candidateCap,
      deploymentWindowMs: config.correlation.deploymentWindowMs,
    },
  });
  const notifier = options.notifier || createNotifier(config.notifier);
  const incidents = new IncidentService({
    correlator,
    ranker,
    topology,
    notifier,
    debounceMs: config.correlation.debounceMs,
    budgetMs: config.correlation.budgetMs,
    incidentTtlMs: config.incidents.ttlMs,
    dataDir: config.incidents.dataDir,
    now,
  });

  return { config, signals, topology, ranker, correlator, notifier, incidents, now };
}

/** Loads the topology and rule files named by the config, when present. */
export async function loadEngineFiles(engine: Engine): Promise<void> {
  const { topologyFile, rulesFile } = engine.config;

  if (existsSync(topologyFile)) {
    await engine.topology.loadFile(topologyFile);
  } else {
    console.warn(`[topology] ${topologyFile} not found; starting with an empty topology`);
  }

  if (rulesFile) {
    await engine.ranker.loadFile(rulesFile);
  }
}

export function startEngine(engine: Engine): void {
  engine.signals.start(engine.config.sweepIntervalMs);
  engine.incidents.start(engine.config.sweepIntervalMs);
}

export function stopEngine(engine: Engine): void {
  engine.signals.stop();
  engine.incidents.stop();
}

let engine: Engine | null = null;

export function getEngine(): Engine {
  if (!engine) {
    engine = createEngine();
  }
  return engine;
}

export function setEngineForTests(next: Engine): void {
  engine = next;
}

export function resetEngineForTests(): void {
  if (engine) stopEngine(engine);
  engine = null;
}
