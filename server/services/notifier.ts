import type { DeploymentCorrelationHint, IncidentReport } from "@shared/incident";
import type { NotifierMode } from "../config";

export interface IncidentNotifier {
  readonly id: string;
  notify(report: Readonly<IncidentReport>, hint: Readonly<DeploymentCorrelationHint> | null): Promise<void>;
}

export interface WebhookNotifierOptions {
  reportUrl: string;
  deploymentHintUrl?: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

/** Copy handed to collaborators: read access transfers, the pipeline keeps write access. */
export function detachForDelivery<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

export class LogNotifier implements IncidentNotifier {
  readonly id = "log";

  async notify(
    report: Readonly<IncidentReport>,
    hint: Readonly<DeploymentCorrelationHint> | null,
  ): Promise<void> {
    console.log(
      `[notifier] ${report.incidentId} ${report.triggerSummary} | ${report.diagnosisStatus}: ${report.diagnosisSummary}`,
    );
    if (hint) {
      console.log(
        `[notifier] Deployment hint for ${hint.service}: ${hint.repository}@${hint.commit}`,
      );
    }
  }
}

export class DisabledNotifier implements IncidentNotifier {
  readonly id = "disabled";

  async notify(): Promise<void> {
    return;
  }
}

export class WebhookNotifier implements IncidentNotifier {
  readonly id = "webhook";
  private readonly options: WebhookNotifierOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebhookNotifierOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl || fetch;
  }

  private async post(url: string, body: unknown): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Webhook delivery to ${url} failed (${response.status})`);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  async notify(
    report: Readonly<IncidentReport>,
    hint: Readonly<DeploymentCorrelationHint> | null,
  ): Promise<void> {
    await this.post(this.options.reportUrl, { type: "incident_report", report });
    if (hint && this.options.deploymentHintUrl) {
      await this.post(this.options.deploymentHintUrl, { type: "deployment_hint", hint });
    }
  }
}

export function createNotifier(config: {
  mode: NotifierMode;
  webhookUrl?: string;
  deploymentHintUrl?: string;
  timeoutMs: number;
}): IncidentNotifier {
  if (config.mode === "disabled") return new DisabledNotifier();
  if (config.mode === "webhook") {
    if (!config.webhookUrl) {
      console.warn("[notifier] NOTIFIER_MODE=webhook without NOTIFIER_WEBHOOK_URL; logging reports instead");
      return new LogNotifier();
    }
    return new WebhookNotifier({
      reportUrl: config.webhookUrl,
      deploymentHintUrl: config.deploymentHintUrl,
      timeoutMs: config.timeoutMs,
    });
  }
  return new LogNotifier();
}
