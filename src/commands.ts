/**
 * CLI command implementations.
 *
 * Each command returns the text to print, so the commander wiring in cli.ts
 * stays free of logic.
 *
 * @module framecalc/commands
 */

import type { ClipList, Config } from './core/config/schema.js';
import { evaluateExpression } from './core/timecode/expression.js';
import type { Timecode } from './core/timecode/timecode.js';
import { buildEditEvents, generateEdl } from './generators/edl/cmx3600.js';

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = 'timecode' | 'frames' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['timecode', 'frames', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// ============================================================================
// Output
// ============================================================================

export function formatResult(tc: Timecode, format: OutputFormat): string {
  switch (format) {
    case 'timecode':
      return tc.timecode;
    case 'frames':
      return tc.totalFrames.toString();
    case 'json':
      return JSON.stringify(tc);
  }
}

// ============================================================================
// Commands
// ============================================================================

/**
 * `calc`: evaluate a timecode expression.
 */
export function runCalc(expression: string, config: Config, format: OutputFormat): string {
  const result = evaluateExpression(expression, { defaultFrameRate: config.timecode.frameRate });
  return formatResult(result, format);
}

/**
 * `convert`: the same real-time position at another rate.
 */
export function runConvert(
  timecode: string,
  fromRate: number,
  toRate: number,
  format: OutputFormat
): string {
  const source = evaluateExpression(timecode, { defaultFrameRate: fromRate });
  return formatResult(source.convertTo(toRate), format);
}

/**
 * `compare`: '<', '=' or '>' between two operands written as HH:MM:SS:FF[@rate].
 */
export function runCompare(a: string, b: string, config: Config): '<' | '=' | '>' {
  const options = { defaultFrameRate: config.timecode.frameRate };
  const order = evaluateExpression(a, options).compare(evaluateExpression(b, options));

  if (order < 0) return '<';
  if (order > 0) return '>';
  return '=';
}

/**
 * `edl`: lay a clip list end to end and render it as a CMX 3600 EDL.
 */
export function runEdl(clipList: ClipList, config: Config): string {
  const events = buildEditEvents(clipList.clips, {
    frameRate: config.timecode.frameRate,
    startTimecode: config.timecode.startTimecode,
  });

  return generateEdl({
    title: clipList.title ?? config.edl.title,
    frameRate: config.timecode.frameRate,
    events,
    includeComments: config.edl.includeComments,
  });
}
