import { z } from "zod";

/** Severity levels in ascending order; the zero value is OK. */
export const ALERT_LEVELS = ["OK", "INFO", "WARNING", "CRITICAL"] as const;

export type AlertLevel = (typeof ALERT_LEVELS)[number];

/**
 * Field values arrive untyped from the alerting pipeline. Only strings can be
 * rendered as annotations; the translator rejects the other variants.
 */
export const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type FieldValue = z.infer<typeof fieldValueSchema>;

/** Alert event as produced by the alerting pipeline. Missing parts take their zero values. */
export const alertEventSchema = z.object({
  topic: z.string().default(""),
  state: z
    .object({
      id: z.string().default(""),
      message: z.string().default(""),
      level: z.enum(ALERT_LEVELS).default("OK"),
    })
    .default({}),
  data: z
    .object({
      name: z.string().default(""),
      taskName: z.string().default(""),
      category: z.string().default(""),
      recoverable: z.boolean().default(false),
      tags: z.record(z.string()).default({}),
      fields: z.record(fieldValueSchema).default({}),
    })
    .default({}),
});

export type AlertEvent = z.infer<typeof alertEventSchema>;

/** One event in AlertManager's POST body. */
export interface WireEvent {
  labels: Record<string, string>;
  annotations: Record<string, string>;
}

/** Label keys always present on a wire event, before tags are overlaid. */
export const FIXED_LABEL_KEYS = [
  "_topic",
  "_ID",
  "_message",
  "_level",
  "_name",
  "_taskName",
  "_category",
  "_recoverable",
] as const;
