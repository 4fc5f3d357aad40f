export class InvalidSignalError extends Error {
  code = "SIGNAL_INVALID" as const;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidSignalError";
    this.issues = issues;
  }
}

export class UnknownServiceError extends Error {
  code = "TOPOLOGY_UNKNOWN_SERVICE" as const;
  service: string;

  constructor(service: string) {
    super(`Service not registered in topology: ${service}`);
    this.name = "UnknownServiceError";
    this.service = service;
  }
}

export class TopologyValidationError extends Error {
  code = "TOPOLOGY_INVALID" as const;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "TopologyValidationError";
    this.issues = issues;
  }
}

export class UpstreamUnavailableError extends Error {
  code = "UPSTREAM_UNAVAILABLE" as const;
  upstream: "signal-store" | "topology";

  constructor(upstream: UpstreamUnavailableError["upstream"], cause: unknown) {
    super(
      `${upstream} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = "UpstreamUnavailableError";
    this.upstream = upstream;
  }
}

export class CorrelationTimeoutError extends Error {
  code = "CORRELATION_TIMEOUT" as const;
  budgetMs: number;

  constructor(budgetMs: number, stage: string) {
    super(`Diagnosis budget of ${budgetMs}ms exceeded during ${stage}`);
    this.name = "CorrelationTimeoutError";
    this.budgetMs = budgetMs;
  }
}

export class CorrelationCancelledError extends Error {
  code = "CORRELATION_CANCELLED" as const;

  constructor(reason: string) {
    super(reason);
    this.name = "CorrelationCancelledError";
  }
}

export class RuleConfigError extends Error {
  code = "RULES_INVALID" as const;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "RuleConfigError";
    this.issues = issues;
  }
}
