/**
 * Project configuration schema (`.unitcheck.yaml`).
 */
import { z } from 'zod';

/** Per-checker severity override. */
export const CheckOverrideSchema = z.object({
  /** Whether findings of this checker fail the run */
  hard: z.boolean(),
});

export const ConfigSchema = z.object({
  /** Build tags enabled by default */
  tags: z.array(z.string()).default([]),
  /** Whether test sources are analysed */
  tests: z.boolean().default(true),
  /** Target language version, `1.N` */
  target: z.string().optional(),
  /** Output format name */
  format: z.string().default('text'),
  /** Suppression rules, as one string or one rule per entry */
  suppress: z
    .union([z.string(), z.array(z.string())])
    .default('')
    .transform((value) => (Array.isArray(value) ? value.join(' ') : value)),
  /** Severity overrides keyed by checker id */
  checks: z.record(CheckOverrideSchema).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type CheckOverride = z.infer<typeof CheckOverrideSchema>;
