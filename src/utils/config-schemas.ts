/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';
import { CAPABILITIES, type HubSettings } from '../types/intelligence.js';
import { unknownCapabilityError } from './error-messages.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for a comma-separated list of strings.
 */
export const commaSeparatedListSchema = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// HUB SETTINGS
// ============================================

export const capabilitySchema = z.enum(CAPABILITIES, {
  errorMap: (issue, ctx) => ({
    message:
      issue.code === 'invalid_enum_value' ? unknownCapabilityError(String(ctx.data)) : ctx.defaultError,
  }),
});

export const DEFAULT_ENABLED_CAPABILITIES = [
  'webAnalysis',
  'automation',
  'aiInteraction',
  'performance',
  'security',
  'accessibility',
] as const;

export const DEFAULT_HUB_SETTINGS: Readonly<HubSettings> = {
  enabledCapabilities: [...DEFAULT_ENABLED_CAPABILITIES],
  autoOptimization: true,
  predictiveBrowsing: true,
  learningMode: true,
  confidenceThreshold: 0.7,
  maxConcurrentTasks: 5,
};

/**
 * Settings as they arrive from the environment (all strings)
 */
export const hubEnvConfigSchema = z.object({
  enabledCapabilities: commaSeparatedListSchema.pipe(z.array(capabilitySchema)).optional(),
  autoOptimization: booleanStringSchema.optional(),
  confidenceThreshold: z.coerce.number().min(0).max(1).optional(),
  maxConcurrentTasks: z.coerce.number().int().min(1).max(20).optional(),
  settingsPath: z.string().min(1).optional(),
  handlersModule: z.string().min(1).optional(),
});

export type HubEnvConfig = z.infer<typeof hubEnvConfigSchema>;

/**
 * Settings block stored under the `intelligence_config` key. Every field is
 * optional so a record written by an older build still loads. Out-of-range
 * numbers are clamped by the hub rather than rejected.
 */
export const persistedSettingsSchema = z.object({
  enabledCapabilities: z.array(capabilitySchema).optional(),
  autoOptimization: z.boolean().optional(),
  predictiveBrowsing: z.boolean().optional(),
  learningMode: z.boolean().optional(),
  confidenceThreshold: z.number().finite().optional(),
  maxConcurrentTasks: z.number().finite().optional(),
});

export type PersistedSettings = z.infer<typeof persistedSettingsSchema>;

// ============================================
// COMPLETE APPLICATION CONFIGURATION
// ============================================

export const hubConfigSchema = z.object({
  settings: persistedSettingsSchema,
  settingsPath: z.string().optional(),
  handlersModule: z.string().optional(),
});

export type HubConfig = z.infer<typeof hubConfigSchema>;

/**
 * Complete validated configuration for the application.
 */
export const appConfigSchema = z.object({
  log: logConfigSchema,
  hub: hubConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
        `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
