/**
 * Compiler settings: defaults merged under user overrides, validated with zod.
 */
import { z } from 'zod';
import {
  DEFAULT_FEEDBACK_LATENCY_GLOBAL,
  DEFAULT_FEEDBACK_LATENCY_LOCAL,
} from './constants';
import { StructureError } from './errors';

export const CompilerSettingsSchema = z.object({
  /** Minimum acquire-to-branch latency when acquisition and playback share a unit (s) */
  feedbackLatencyLocal: z.number().positive().default(DEFAULT_FEEDBACK_LATENCY_LOCAL),
  /** Minimum acquire-to-branch latency through the synchronization hub (s) */
  feedbackLatencyGlobal: z.number().positive().default(DEFAULT_FEEDBACK_LATENCY_GLOBAL),
  /** Reject under-specified feedback delays instead of clamping them */
  strictFeedbackLatency: z.boolean().default(false),
  maxManifestEvents: z.number().int().positive().default(10_000),
  expandLoopsInManifest: z.boolean().default(true),
  phaseResolutionBits: z.number().int().min(1).max(48).default(24),
}).strict();

export type CompilerSettings = z.infer<typeof CompilerSettingsSchema>;
export type CompilerSettingsInput = z.input<typeof CompilerSettingsSchema>;

/** Format zod issues as `path: message` lines. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseSettings(input: unknown = {}): { settings?: CompilerSettings; errors: StructureError[] } {
  const parsed = CompilerSettingsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return { errors: [new StructureError(`Invalid compiler settings: ${formatIssues(parsed.error.issues)}`)] };
  }
  return { settings: parsed.data, errors: [] };
}

export function defaultSettings(): CompilerSettings {
  return CompilerSettingsSchema.parse({});
}
