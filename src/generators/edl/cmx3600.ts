/**
 * CMX 3600 EDL Generator.
 * Renders edit events as an industry-standard Edit Decision List.
 */

import type { Clip } from '../../core/config/schema.js';
import { createEditEvent, type EditEvent } from '../../core/edit/event.js';
import { Timecode } from '../../core/timecode/timecode.js';

// ============================================================================
// Types
// ============================================================================

export interface EdlDocument {
  title: string;
  /** Every timecode is converted to this rate before it is written */
  frameRate: number;
  events: EditEvent[];
  includeComments?: boolean;
}

export interface BuildOptions {
  /** Record timeline rate */
  frameRate: number;
  /** Record timecode of the first event */
  startTimecode: string;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_EVENTS = 999;
const AUX_REEL = 'AX';

// ============================================================================
// EDL Event Builder
// ============================================================================

/**
 * Lay clips end to end on the record timeline.
 *
 * Each clip keeps its own source rate; its duration is rescaled into the
 * record rate, so a 2 second clip at 16fps occupies 48 record frames at 24fps.
 */
export function buildEditEvents(clips: Clip[], options: BuildOptions): EditEvent[] {
  const events: EditEvent[] = [];
  let record = Timecode.parse(options.startTimecode, options.frameRate);

  for (const clip of clips.slice(0, MAX_EVENTS)) {
    const sourceRate = clip.frameRate ?? options.frameRate;
    const sourceIn = Timecode.parse(clip.sourceIn, sourceRate);
    const sourceOut = Timecode.parse(clip.sourceOut, sourceRate);
    const recordOut = record.add(sourceOut.subtract(sourceIn));

    events.push(
      createEditEvent({
        eventName: clip.name ?? null,
        tracks: clip.tracks,
        tape: clip.tape,
        scene: clip.scene ?? null,
        comment: clip.comment ?? null,
        sourceIn,
        sourceOut,
        recordIn: record,
        recordOut,
      })
    );

    record = recordOut;
  }

  return events;
}

// ============================================================================
// EDL Formatting
// ============================================================================

/**
 * Format a single EDL event line.
 */
function formatEventLine(event: EditEvent, eventNumber: number, frameRate: number): string {
  const eventNum = eventNumber.toString().padStart(3, '0');
  const reel = (event.tape ?? AUX_REEL).substring(0, 8).toUpperCase().padEnd(8, ' ');
  const tracks = event.tracks.padEnd(5, ' ');

  const at = (tc: Timecode) => tc.convertTo(frameRate).timecode;

  return (
    `${eventNum}  ${reel} ${tracks} C        ` +
    `${at(event.sourceIn)} ${at(event.sourceOut)} ${at(event.recordIn)} ${at(event.recordOut)}`
  );
}

function formatComments(event: EditEvent): string[] {
  const lines: string[] = [];

  if (event.eventName) {
    lines.push(`* FROM CLIP NAME: ${event.eventName}`);
  }
  if (event.scene) {
    lines.push(`* SCENE: ${event.scene}`);
  }
  if (event.comment) {
    lines.push(`* COMMENT: ${event.comment}`);
  }

  return lines;
}

/**
 * Generate complete EDL document as string.
 * Events past the 999th are not written.
 */
export function generateEdl(document: EdlDocument): string {
  const includeComments = document.includeComments ?? true;
  const lines: string[] = [];

  lines.push(`TITLE: ${document.title}`);
  lines.push('');
  lines.push('FCM: NON-DROP FRAME');
  lines.push('');

  document.events.slice(0, MAX_EVENTS).forEach((event, index) => {
    lines.push(formatEventLine(event, index + 1, document.frameRate));

    if (includeComments) {
      lines.push(...formatComments(event));
    }

    lines.push('');
  });

  return lines.join('\n');
}

/**
 * Validate EDL document for common issues.
 */
export function validateEdl(document: EdlDocument): string[] {
  const errors: string[] = [];

  if (document.events.length === 0) {
    errors.push('EDL has no events');
  }

  if (document.events.length > MAX_EVENTS) {
    errors.push(`EDL has ${document.events.length} events, maximum is ${MAX_EVENTS}`);
  }

  document.events.forEach((event, index) => {
    if (event.tape !== null && !/^[A-Z0-9_-]+$/i.test(event.tape)) {
      errors.push(`Event ${index + 1}: Tape name "${event.tape}" contains invalid characters`);
    }
  });

  return errors;
}
