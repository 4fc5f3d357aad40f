import type {
  IngestSignalsResponse,
  Signal,
  SignalKind,
  SignalStoreStats,
  TimeRange,
} from "@shared/signal";
import { InvalidSignalError } from "./errors";
import { formatIssues, SignalInputSchema } from "./schemas";

const DEFAULT_RETENTION_MS = 24 * 60 * 60_000;
const DEFAULT_CLOCK_SKEW_MS = 2 * 60_000;

export type IngestOutcome = "accepted" | "duplicate";

/** Read side of the store, as seen by the correlator. */
export interface SignalReader {
  query(service: string, kinds: readonly SignalKind[] | undefined, range: TimeRange): Iterable<Signal>;
}

export interface SignalStoreOptions {
  retentionMs?: number;
  clockSkewToleranceMs?: number;
  now?: () => number;
}

interface SignalLocation {
  service: string;
  timestamp: number;
}

function compareSignals(a: Pick<Signal, "timestamp" | "id">, b: Pick<Signal, "timestamp" | "id">): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/** First index whose signal sorts at or after `probe`. */
function lowerBound(series: readonly Signal[], probe: Pick<Signal, "timestamp" | "id">): number {
  let lo = 0;
  let hi = series.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareSignals(series[mid], probe) < 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function firstAtOrAfter(series: readonly Signal[], timestamp: number): number {
  return lowerBound(series, { timestamp, id: "" });
}

function* scanSeries(
  series: readonly Signal[],
  kinds: ReadonlySet<SignalKind> | undefined,
  range: TimeRange,
): Generator<Signal> {
  for (let index = firstAtOrAfter(series, range.from); index < series.length; index += 1) {
    const signal = series[index];
    if (signal.timestamp > range.to) return;
    if (!kinds || kinds.has(signal.kind)) yield signal;
  }
}

function freezeSignal(signal: Signal): Signal {
  Object.freeze(signal.attributes);
  return Object.freeze(signal);
}

/**
 * Per-service, time-ordered signal series with copy-on-write snapshots.
 *
 * A query pins the series array it reads; the next write to that service copies the
 * array before touching it, so iteration never observes a concurrent insert or eviction.
 */
export class SignalStore implements SignalReader {
  private readonly retentionMs: number;
  private readonly clockSkewToleranceMs: number;
  private readonly now: () => number;
  private readonly series = new Map<string, Signal[]>();
  private readonly pinned = new WeakSet<Signal[]>();
  private readonly locations = new Map<string, SignalLocation>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: SignalStoreOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.clockSkewToleranceMs = options.clockSkewToleranceMs ?? DEFAULT_CLOCK_SKEW_MS;
    this.now = options.now || (() => Date.now());
  }

  private writableSeries(service: string): Signal[] {
    const current = this.series.get(service);
    if (!current) {
      const created: Signal[] = [];
      this.series.set(service, created);
      return created;
    }
    if (!this.pinned.has(current)) return current;

    const copy = current.slice();
    this.series.set(service, copy);
    return copy;
  }

  ingest(input: unknown): IngestOutcome {
    const parsed = SignalInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new InvalidSignalError(`Invalid signal: ${issues.join("; ")}`, issues);
    }

    const data = parsed.data;
    const latestAccepted = this.now() + this.clockSkewToleranceMs;
    if (data.timestamp > latestAccepted) {
      throw new InvalidSignalError(
        `Signal ${data.id} timestamp ${data.timestamp} is beyond the clock-skew tolerance`,
        [`timestamp: later than ${latestAccepted}`],
      );
    }

    const existing = this.locations.get(data.id);
    if (existing) {
      const series = this.writableSeries(existing.service);
      const index = lowerBound(series, { timestamp: existing.timestamp, id: data.id });
      const current = series[index];
      if (current?.id === data.id) {
        series[index] = freezeSignal({ ...current, attributes: { ...data.attributes } });
      }
      return "duplicate";
    }

    const signal = freezeSignal({
      id: data.id,
      service: data.service,
      kind: data.kind,
      timestamp: data.timestamp,
      severity: data.severity,
      attributes: data.attributes,
      ...(data.numericValue !== undefined ? { numericValue: data.numericValue } : {}),
    });

    const series = this.writableSeries(signal.service);
    series.splice(lowerBound(series, signal), 0, signal);
    this.locations.set(signal.id, { service: signal.service, timestamp: signal.timestamp });
    return "accepted";
  }

  ingestBatch(inputs: readonly unknown[]): IngestSignalsResponse {
    const response: IngestSignalsResponse = { accepted: 0, duplicates: 0, rejected: [] };

    inputs.forEach((input, index) => {
      try {
        if (this.ingest(input) === "accepted") response.accepted += 1;
        else response.duplicates += 1;
      } catch (error) {
        if (!(error instanceof InvalidSignalError)) throw error;
        const id =
          typeof input === "object" && input !== null && "id" in input && typeof input.id === "string"
            ? input.id
            : undefined;
        response.rejected.push({ index, id, reason: error.message });
      }
    });

    if (response.rejected.length > 0) {
      console.warn(
        `[signals] Rejected ${response.rejected.length} of ${inputs.length} signal(s): ${response.rejected[0].reason}`,
      );
    }
    return response;
  }

  query(
    service: string,
    kinds: readonly SignalKind[] | undefined,
    range: TimeRange,
  ): Iterable<Signal> {
    const snapshot = this.series.get(service);
    if (!snapshot || range.to < range.from) return [];

    this.pinned.add(snapshot);
    const kindSet = kinds && kinds.length > 0 ? new Set(kinds) : undefined;
    return {
      [Symbol.iterator]: () => scanSeries(snapshot, kindSet, range),
    };
  }

  evictExpired(now = this.now()): number {
    const cutoff = now - this.retentionMs;
    let removed = 0;

    for (const [service, current] of Array.from(this.series.entries())) {
      const keepFrom = firstAtOrAfter(current, cutoff);
      if (keepFrom === 0) continue;

      for (const signal of current.slice(0, keepFrom)) {
        this.locations.delete(signal.id);
      }
      removed += keepFrom;

      if (keepFrom === current.length) this.series.delete(service);
      else this.series.set(service, current.slice(keepFrom));
    }

    if (removed > 0) {
      console.log(`[signals] Evicted ${removed} signal(s) older than ${new Date(cutoff).toISOString()}`);
    }
    return removed;
  }

  start(sweepIntervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.evictExpired(), sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  stats(): SignalStoreStats {
    let signalCount = 0;
    let oldestTimestamp: number | undefined;
    let newestTimestamp: number | undefined;

    for (const current of this.series.values()) {
      signalCount += current.length;
      const first = current[0];
      const last = current[current.length - 1];
      if (first && (oldestTimestamp === undefined || first.timestamp < oldestTimestamp)) {
        oldestTimestamp = first.timestamp;
      }
      if (last && (newestTimestamp === undefined || last.timestamp > newestTimestamp)) {
        newestTimestamp = last.timestamp;
      }
    }

    return {
      signalCount,
      serviceCount: this.series.size,
      oldestTimestamp,
      newestTimestamp,
    };
  }
}
