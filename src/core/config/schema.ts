/**
 * Configuration schema for framecalc.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';
import { Timecode, TIMECODE_REGEX } from '../timecode/timecode.js';
import { TimecodeParseError, TimecodeRangeError } from '../timecode/errors.js';

// ============================================================================
// Sub-schemas
// ============================================================================

const TimecodeConfigSchema = z.object({
  /** Rate for timecodes written without an explicit @rate */
  frameRate: z.number().positive().default(24),
  startTimecode: z.string().regex(TIMECODE_REGEX).default('01:00:00:00'),
});

const EdlConfigSchema = z.object({
  title: z.string().min(1).default('UNTITLED'),
  includeComments: z.boolean().default(true),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  prettyPrint: z.boolean().default(true),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  timecode: TimecodeConfigSchema.default({}),
  edl: EdlConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Clip List Schema
// ============================================================================

const ClipSchema = z.object({
  tape: z.string().min(1).max(8), // CMX 3600 limit
  sourceIn: z.string().regex(TIMECODE_REGEX),
  sourceOut: z.string().regex(TIMECODE_REGEX),
  /** Source rate, when it differs from the EDL rate */
  frameRate: z.number().positive().optional(),
  tracks: z.string().default('V'),
  name: z.string().optional(),
  scene: z.string().optional(),
  comment: z.string().optional(),
});

/**
 * Clips laid end to end on the record timeline by the `edl` command.
 */
export const ClipListSchema = z.object({
  title: z.string().min(1).optional(),
  clips: z.array(ClipSchema).min(1),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type TimecodeConfig = z.infer<typeof TimecodeConfigSchema>;
export type EdlConfig = z.infer<typeof EdlConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Clip = z.infer<typeof ClipSchema>;
export type ClipList = z.infer<typeof ClipListSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Returns parsed config or throws ZodError.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

/**
 * Validate configuration without throwing.
 * Returns result object with success flag.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(raw ?? {});
}

/**
 * Validate a clip list read from YAML or JSON.
 * Throws ZodError.
 */
export function parseClipList(raw: unknown): ClipList {
  return ClipListSchema.parse(raw);
}

/**
 * Check that the start timecode is valid at the configured frame rate.
 * Zod only checks its shape.
 */
export function validateStartTimecode(config: Config): string[] {
  const { frameRate, startTimecode } = config.timecode;

  try {
    Timecode.parse(startTimecode, frameRate);
    return [];
  } catch (error) {
    if (error instanceof TimecodeRangeError || error instanceof TimecodeParseError) {
      return [`timecode.startTimecode: ${error.message}`];
    }
    throw error;
  }
}

export type ConfigCheck =
  | { success: true; config: Config }
  | { success: false; errors: string[] };

/**
 * Schema and semantic checks in one pass. Each error reads `path: message`.
 */
export function checkConfig(raw: unknown): ConfigCheck {
  const result = safeParseConfig(raw);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const errors = validateStartTimecode(result.data);
  if (errors.length > 0) {
    return { success: false, errors };
  }

  return { success: true, config: result.data };
}
