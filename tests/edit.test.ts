/**
 * Edit event tests.
 */

import { describe, it, expect } from 'vitest';
import {
  createEditEvent,
  eventDuration,
  sourceDuration,
  validateEditEvent,
} from '../src/core/edit/event.js';
import { Timecode } from '../src/core/timecode/timecode.js';
import { TimecodeRangeError } from '../src/core/timecode/errors.js';

describe('createEditEvent', () => {
  it('defaults every timecode to one hour at 24fps', () => {
    const event = createEditEvent();
    expect(event.tracks).toBe('VA1A2');
    expect(event.recordIn.timecode).toBe('01:00:00:00');
    expect(event.recordIn.frameRate).toBe(24);
    expect(event.sourceOut.timecode).toBe('01:00:00:00');
    expect(event.tape).toBeNull();
    expect(event.eventName).toBeNull();
    expect(event.createdAt).toBeInstanceOf(Date);
  });

  it('uses the given rate for default timecodes', () => {
    expect(createEditEvent({ frameRate: 25 }).recordIn.frameRate).toBe(25);
  });

  it('does not share default timecodes between fields', () => {
    const event = createEditEvent();
    event.recordOut.seconds = 5;
    expect(event.recordIn.timecode).toBe('01:00:00:00');
  });
});

describe('durations', () => {
  it('measures record and source spans', () => {
    const event = createEditEvent({
      recordOut: Timecode.parse('01:00:10:12', 24),
      sourceIn: Timecode.parse('10:00:00:00', 24),
      sourceOut: Timecode.parse('10:00:10:12', 24),
    });

    expect(eventDuration(event).timecode).toBe('00:00:10:12');
    expect(sourceDuration(event).timecode).toBe('00:00:10:12');
  });

  it('throws when out is before in', () => {
    const event = createEditEvent({ recordOut: Timecode.parse('00:59:59:00', 24) });
    expect(() => eventDuration(event)).toThrow(TimecodeRangeError);
  });
});

describe('validateEditEvent', () => {
  it('returns empty array for valid event', () => {
    const event = createEditEvent({
      tape: 'A001',
      recordOut: Timecode.parse('01:00:05:00', 24),
      sourceIn: Timecode.parse('10:00:00:00', 24),
      sourceOut: Timecode.parse('10:00:05:00', 24),
    });
    expect(validateEditEvent(event)).toEqual([]);
  });

  it('catches out points before in points', () => {
    const event = createEditEvent({ recordOut: Timecode.parse('00:59:59:00', 24) });
    expect(validateEditEvent(event)).toEqual([
      'Record out 00:59:59:00 is before record in 01:00:00:00',
    ]);
  });

  it('catches mismatched durations', () => {
    const event = createEditEvent({ recordOut: Timecode.parse('01:00:05:00', 24) });
    expect(validateEditEvent(event)).toEqual([
      'Record duration 00:00:05:00 does not match source duration 00:00:00:00',
    ]);
  });

  it('compares durations across rates by real time', () => {
    const event = createEditEvent({
      recordOut: Timecode.parse('01:00:02:00', 24),
      sourceIn: Timecode.parse('00:00:00:00', 16),
      sourceOut: Timecode.parse('00:00:02:00', 16),
    });
    expect(validateEditEvent(event)).toEqual([]);
  });

  it('catches long tape names and invalid tracks', () => {
    expect(validateEditEvent(createEditEvent({ tape: 'TOOLONGNAME' }))).toEqual([
      'Tape name "TOOLONGNAME" exceeds 8 characters',
    ]);
    expect(validateEditEvent(createEditEvent({ tracks: 'X1' }))).toEqual([
      'Track list "X1" contains invalid characters',
    ]);
  });
});
