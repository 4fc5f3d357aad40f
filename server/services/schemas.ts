import { z } from "zod";
import { DIAGNOSIS_RULE_IDS } from "@shared/rca";
import { SIGNAL_KINDS, SIGNAL_SEVERITIES } from "@shared/signal";
import { SERVICE_CRITICALITIES } from "@shared/topology";

const nonEmpty = z.string().trim().min(1);

export const SignalInputSchema = z.object({
  id: nonEmpty,
  service: nonEmpty,
  kind: z.enum(SIGNAL_KINDS),
  timestamp: z.number().finite(),
  severity: z.enum(SIGNAL_SEVERITIES).default("info"),
  attributes: z
    .record(z.union([z.string(), z.number(), z.boolean()]))
    .default({})
    .transform((attributes) =>
      Object.fromEntries(
        Object.entries(attributes).map(([key, value]) => [key, String(value)]),
      ),
    ),
  numericValue: z.number().finite().optional(),
});

export const TriggerSchema = z.object({
  service: nonEmpty,
  timestamp: z.number().finite().optional(),
  severity: z.enum(SIGNAL_SEVERITIES),
  metricName: nonEmpty.optional(),
  value: z.number().finite().optional(),
  alarmId: nonEmpty.optional(),
});

export const TopologyDocumentSchema = z.object({
  services: z.array(
    z.object({
      name: nonEmpty,
      criticality: z.enum(SERVICE_CRITICALITIES).default("medium"),
      dependencies: z.array(nonEmpty).default([]),
      externalDependencies: z.array(nonEmpty).optional(),
      owner: nonEmpty.optional(),
      slaTarget: nonEmpty.optional(),
    }),
  ),
});

export const RuleOverridesSchema = z.object({
  rules: z
    .record(
      z.enum(DIAGNOSIS_RULE_IDS),
      z.object({
        enabled: z.boolean().optional(),
        baseWeight: z.number().min(0).max(1).optional(),
      }),
    )
    .optional(),
  metricThresholds: z.record(z.number().finite()).optional(),
  latencyThresholdMs: z.number().positive().optional(),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
