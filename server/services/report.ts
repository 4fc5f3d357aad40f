import type {
  DeploymentCorrelationHint,
  Incident,
  IncidentReport,
} from "@shared/incident";

export const NO_HYPOTHESIS_SUMMARY =
  "No automatic hypothesis: manual investigation required.";

function describeTrigger(incident: Incident): string {
  const trigger = incident.triggerSignal;
  const parts = [`${trigger.severity.toUpperCase()} alert on ${incident.service}`];
  if (trigger.attributes.metricName) {
    parts.push(
      trigger.numericValue !== undefined
        ? `${trigger.attributes.metricName}=${trigger.numericValue}`
        : trigger.attributes.metricName,
    );
  }
  if (trigger.attributes.alarmId) parts.push(`alarm ${trigger.attributes.alarmId}`);
  parts.push(`at ${new Date(trigger.timestamp).toISOString()}`);
  return parts.join(" ");
}

function summarizeDiagnosis(incident: Incident): string {
  const top = incident.rankedCauses[0];
  switch (incident.diagnosisStatus) {
    case "pending":
      return "Diagnosis in progress.";
    case "complete":
      return top
        ? `${top.title} (confidence ${top.confidenceScore.toFixed(2)}): ${top.explanation}`
        : NO_HYPOTHESIS_SUMMARY;
    case "partial":
      return top
        ? `Partial diagnosis, budget exceeded. Best hypothesis so far: ${top.title} (confidence ${top.confidenceScore.toFixed(2)}).`
        : `Partial diagnosis, budget exceeded before any hypothesis matched. ${NO_HYPOTHESIS_SUMMARY}`;
    case "failed":
      return `Correlation failed; evidence was unavailable. ${NO_HYPOTHESIS_SUMMARY}`;
    case "empty":
      return NO_HYPOTHESIS_SUMMARY;
  }
}

export function buildIncidentReport(incident: Incident, generatedAt = Date.now()): IncidentReport {
  const recommendedMitigations = Array.from(
    new Set(incident.rankedCauses.map((cause) => cause.recommendedMitigation)),
  );

  return {
    incidentId: incident.id,
    service: incident.service,
    state: incident.state,
    triggerSummary: describeTrigger(incident),
    rankedCauses: incident.rankedCauses.map((cause, index) => ({
      rank: index + 1,
      ruleId: cause.ruleId,
      title: cause.title,
      explanation: cause.explanation,
      confidenceScore: cause.confidenceScore,
      recommendedMitigation: cause.recommendedMitigation,
      supportingSignalIds: cause.supportingSignals.map((signal) => signal.id),
    })),
    recommendedMitigations,
    candidateSignalCount: incident.candidateSignals.length,
    diagnosisStatus: incident.diagnosisStatus,
    diagnosisSummary: summarizeDiagnosis(incident),
    notes: [...incident.notes],
    generatedAt,
  };
}

/** Commit and repository of the deployment behind a top-ranked deployment regression. */
export function buildDeploymentHint(incident: Incident): DeploymentCorrelationHint | null {
  const top = incident.rankedCauses[0];
  if (!top || top.ruleId !== "deployment-regression") return null;

  const deployment = [...top.supportingSignals]
    .reverse()
    .find(
      (signal) =>
        signal.kind === "deployment" && signal.attributes.commit && signal.attributes.repository,
    );
  if (!deployment) return null;

  return {
    commit: deployment.attributes.commit,
    repository: deployment.attributes.repository,
    service: deployment.service,
  };
}
