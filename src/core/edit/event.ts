/**
 * Editorial events.
 *
 * An edit event places a span of source material (sourceIn → sourceOut on a
 * tape) onto the record timeline (recordIn → recordOut).
 */

import { rescaleFrames } from '../timecode/rate.js';
import { Timecode } from '../timecode/timecode.js';

// ============================================================================
// Types
// ============================================================================

export interface EditEvent {
  eventName: string | null;
  /** Track list in EDL notation, e.g. 'V', 'A1', 'VA1A2' */
  tracks: string;
  recordIn: Timecode;
  recordOut: Timecode;
  sourceIn: Timecode;
  sourceOut: Timecode;
  /** Source reel name (max 8 chars in CMX 3600) */
  tape: string | null;
  scene: string | null;
  comment: string | null;
  createdAt: Date;
}

export interface EditEventInit extends Partial<EditEvent> {
  /** Rate for any timecode left at its default. Defaults to 24. */
  frameRate?: number;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_FRAME_RATE = 24;
const DEFAULT_TIMECODE = '01:00:00:00';
const DEFAULT_TRACKS = 'VA1A2';
const MAX_TAPE_NAME_LENGTH = 8;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an edit event. Timecodes not given start at one hour.
 */
export function createEditEvent(init: EditEventInit = {}): EditEvent {
  const { frameRate = DEFAULT_FRAME_RATE, ...fields } = init;
  const start = () => Timecode.parse(DEFAULT_TIMECODE, frameRate);

  return {
    eventName: fields.eventName ?? null,
    tracks: fields.tracks ?? DEFAULT_TRACKS,
    recordIn: fields.recordIn ?? start(),
    recordOut: fields.recordOut ?? start(),
    sourceIn: fields.sourceIn ?? start(),
    sourceOut: fields.sourceOut ?? start(),
    tape: fields.tape ?? null,
    scene: fields.scene ?? null,
    comment: fields.comment ?? null,
    createdAt: fields.createdAt ?? new Date(),
  };
}

// ============================================================================
// Durations
// ============================================================================

/**
 * Length of the event on the record timeline, at the recordOut rate.
 *
 * @throws TimecodeRangeError when recordOut is before recordIn
 */
export function eventDuration(event: EditEvent): Timecode {
  return event.recordOut.subtract(event.recordIn);
}

/**
 * Length of the source span, at the sourceOut rate.
 */
export function sourceDuration(event: EditEvent): Timecode {
  return event.sourceOut.subtract(event.sourceIn);
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check an event for common issues. Returns an empty array when valid.
 */
export function validateEditEvent(event: EditEvent): string[] {
  const errors: string[] = [];

  if (event.recordOut.lessThan(event.recordIn)) {
    errors.push(`Record out ${event.recordOut.timecode} is before record in ${event.recordIn.timecode}`);
  }

  if (event.sourceOut.lessThan(event.sourceIn)) {
    errors.push(`Source out ${event.sourceOut.timecode} is before source in ${event.sourceIn.timecode}`);
  }

  // The source span is rounded into the record rate the same way clips are
  // laid on the timeline, so a cross-rate event matches to the frame.
  if (errors.length === 0) {
    const record = eventDuration(event);
    const source = sourceDuration(event);

    if (record.totalFrames !== rescaleFrames(source.totalFrames, source.frameRate, record.frameRate)) {
      errors.push(
        `Record duration ${record.timecode} does not match source duration ${source.timecode}`
      );
    }
  }

  if (event.tape !== null && event.tape.length > MAX_TAPE_NAME_LENGTH) {
    errors.push(`Tape name "${event.tape}" exceeds ${MAX_TAPE_NAME_LENGTH} characters`);
  }

  if (!/^[VA0-9]+$/.test(event.tracks)) {
    errors.push(`Track list "${event.tracks}" contains invalid characters`);
  }

  return errors;
}
