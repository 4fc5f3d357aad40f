export const SIGNAL_KINDS = ["metric", "log", "trace", "deployment", "alarm"] as const;
export type SignalKind = (typeof SIGNAL_KINDS)[number];

export const SIGNAL_SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type SignalSeverity = (typeof SIGNAL_SEVERITIES)[number];

const SEVERITY_RANK: Record<SignalSeverity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
  info: 0,
};

export function severityRank(severity: SignalSeverity): number {
  return SEVERITY_RANK[severity];
}

export interface Signal {
  readonly id: string;
  readonly service: string;
  readonly kind: SignalKind;
  /** Epoch milliseconds. */
  readonly timestamp: number;
  readonly severity: SignalSeverity;
  readonly attributes: Readonly<Record<string, string>>;
  readonly numericValue?: number;
}

export interface TimeRange {
  from: number;
  to: number;
}

export interface IngestRejection {
  index: number;
  id?: string;
  reason: string;
}

export interface IngestSignalsResponse {
  accepted: number;
  duplicates: number;
  rejected: IngestRejection[];
}

export interface SignalStoreStats {
  signalCount: number;
  serviceCount: number;
  oldestTimestamp?: number;
  newestTimestamp?: number;
}
