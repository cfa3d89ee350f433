/**
 * framecalc
 *
 * Frame-accurate timecode arithmetic across frame rates.
 *
 * @module framecalc
 */

export {
  Timecode,
  type TimecodeComponent,
  type TimecodeComponents,
  type TimecodeJson,
  type TimecodeOperand,
} from './core/timecode/timecode.js';
export { TimecodeParseError, TimecodeRangeError } from './core/timecode/errors.js';
export {
  assertFrameCount,
  assertFrameRate,
  framesToMs,
  msToFrames,
  nominalFrameRate,
  rescaleFrames,
  compareRealTime,
  roundHalfAwayFromZero,
} from './core/timecode/rate.js';
export {
  evaluateExpression,
  tokenise,
  ExpressionError,
  type EvaluateOptions,
  type ExpressionToken,
} from './core/timecode/expression.js';
export {
  createEditEvent,
  eventDuration,
  sourceDuration,
  validateEditEvent,
  type EditEvent,
  type EditEventInit,
} from './core/edit/event.js';
export {
  buildEditEvents,
  generateEdl,
  validateEdl,
  type BuildOptions,
  type EdlDocument,
} from './generators/edl/cmx3600.js';
export {
  ConfigSchema,
  ClipListSchema,
  parseConfig,
  safeParseConfig,
  parseClipList,
  validateStartTimecode,
  checkConfig,
  type ConfigCheck,
  type Config,
  type Clip,
  type ClipList,
} from './core/config/schema.js';
export { createLogger, loadConfig } from './app.js';
