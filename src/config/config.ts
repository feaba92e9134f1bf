/**
 * Configuration resolution.
 *
 * Turns whatever a config loader produced into the validated, defaulted
 * EditorConfig the engine consumes. Every field is optional; missing fields
 * take their default, malformed ones fail the whole resolution.
 */

import { z } from 'zod/mini';
import type { EditorConfig } from '../types/state.ts';
import { EditorError, err, ok, type Result } from '../types/errors.ts';

export const DEFAULT_CONFIG: EditorConfig = Object.freeze({
  textWidth: 80,
  tabWidth: 4,
  autosaveIntervalSeconds: 30,
  dailyGoal: 0,
  showStreak: true,
  showProgress: true,
  versionsEnabled: true,
  maxVersions: 100,
  versionOnAutosave: false,
  statusTimeoutSeconds: 3,
  undoGroupWindowMs: 2000,
  historyLimit: 1000,
});

const positiveInt = () => z.int().check(z.gte(1));
const nonNegativeInt = () => z.int().check(z.gte(0));

const ConfigSchema = z.object({
  textWidth: z.optional(positiveInt()),
  tabWidth: z.optional(z.int().check(z.gte(1), z.lte(16))),
  autosaveIntervalSeconds: z.optional(nonNegativeInt()),
  dailyGoal: z.optional(nonNegativeInt()),
  showStreak: z.optional(z.boolean()),
  showProgress: z.optional(z.boolean()),
  versionsEnabled: z.optional(z.boolean()),
  maxVersions: z.optional(positiveInt()),
  versionOnAutosave: z.optional(z.boolean()),
  statusTimeoutSeconds: z.optional(nonNegativeInt()),
  undoGroupWindowMs: z.optional(nonNegativeInt()),
  historyLimit: z.optional(positiveInt()),
});

export type ConfigInput = z.infer<typeof ConfigSchema>;

/**
 * Validate `input` and fill in defaults.
 * `undefined` and `null` resolve to the defaults.
 */
export function resolveConfig(input: unknown): Result<EditorConfig> {
  const parsed = ConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return err(new EditorError('config_invalid', `Invalid configuration: ${details}`));
  }

  const value = parsed.data;
  return ok(Object.freeze({
    textWidth: value.textWidth ?? DEFAULT_CONFIG.textWidth,
    tabWidth: value.tabWidth ?? DEFAULT_CONFIG.tabWidth,
    autosaveIntervalSeconds: value.autosaveIntervalSeconds ?? DEFAULT_CONFIG.autosaveIntervalSeconds,
    dailyGoal: value.dailyGoal ?? DEFAULT_CONFIG.dailyGoal,
    showStreak: value.showStreak ?? DEFAULT_CONFIG.showStreak,
    showProgress: value.showProgress ?? DEFAULT_CONFIG.showProgress,
    versionsEnabled: value.versionsEnabled ?? DEFAULT_CONFIG.versionsEnabled,
    maxVersions: value.maxVersions ?? DEFAULT_CONFIG.maxVersions,
    versionOnAutosave: value.versionOnAutosave ?? DEFAULT_CONFIG.versionOnAutosave,
    statusTimeoutSeconds: value.statusTimeoutSeconds ?? DEFAULT_CONFIG.statusTimeoutSeconds,
    undoGroupWindowMs: value.undoGroupWindowMs ?? DEFAULT_CONFIG.undoGroupWindowMs,
    historyLimit: value.historyLimit ?? DEFAULT_CONFIG.historyLimit,
  }));
}

/**
 * Partial overrides on top of the defaults, for callers that build the
 * configuration in code.
 */
export function withConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  return Object.freeze({ ...DEFAULT_CONFIG, ...overrides });
}
