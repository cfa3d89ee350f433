/**
 * SMPTE-style timecode value type.
 *
 * A Timecode stores nothing but an absolute frame count and a frame rate.
 * Hours, minutes, seconds and frames are derived on every read, and writing
 * one of them rewrites the frame count. Arithmetic between timecodes at
 * different rates rescales the right operand into the left operand's rate,
 * which is always the rate of the result.
 *
 * Drop-frame timecode is not supported.
 */

import { TimecodeParseError, TimecodeRangeError } from './errors.js';
import {
  assertFrameCount,
  assertFrameRate,
  compareRealTime,
  framesToMs,
  msToFrames,
  nominalFrameRate,
  rescaleFrames,
  roundHalfAwayFromZero,
} from './rate.js';

// ============================================================================
// Types
// ============================================================================

export interface TimecodeComponents {
  hours: number;
  minutes: number;
  seconds: number;
  frames: number;
}

export type TimecodeComponent = keyof TimecodeComponents;

/**
 * Anything a timecode can be added to or subtracted from: another timecode
 * (at any rate), a timecode string read at the left operand's rate, or a
 * whole number of frames in the left operand's rate.
 */
export type TimecodeOperand = Timecode | string | number;

export interface TimecodeJson {
  timecode: string;
  frameRate: number;
  totalFrames: number;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * HH:MM:SS:FF. Hours grow past two digits beyond 99h, and frames do at rates
 * above 100fps; a wider field never starts with 0, so every accepted string
 * is the canonical form of its value.
 */
export const TIMECODE_REGEX = /^(\d{2}|[1-9]\d{2,}):(\d{2}):(\d{2}):(\d{2}|[1-9]\d{2,})$/;

const SECONDS_PER_MINUTE = 60;
const MINUTES_PER_HOUR = 60;

// ============================================================================
// Component Helpers
// ============================================================================

function validateComponent(name: TimecodeComponent, value: number, nominalRate: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new TimecodeRangeError(`${capitalise(name)} must be a non-negative integer, got ${value}`);
  }

  switch (name) {
    case 'minutes':
      if (value >= MINUTES_PER_HOUR) {
        throw new TimecodeRangeError(`Minutes must be 0-59, got ${value}`);
      }
      break;
    case 'seconds':
      if (value >= SECONDS_PER_MINUTE) {
        throw new TimecodeRangeError(`Seconds must be 0-59, got ${value}`);
      }
      break;
    case 'frames':
      if (value >= nominalRate) {
        throw new TimecodeRangeError(`Frames must be 0-${nominalRate - 1}, got ${value}`);
      }
      break;
    case 'hours':
      break;
  }
}

function validateComponents(components: TimecodeComponents, nominalRate: number): void {
  validateComponent('hours', components.hours, nominalRate);
  validateComponent('minutes', components.minutes, nominalRate);
  validateComponent('seconds', components.seconds, nominalRate);
  validateComponent('frames', components.frames, nominalRate);
}

/**
 * totalFrames = ((hours * 60 + minutes) * 60 + seconds) * rate + frames
 */
function componentsToFrames(components: TimecodeComponents, nominalRate: number): number {
  const { hours, minutes, seconds, frames } = components;
  const totalSeconds = (hours * MINUTES_PER_HOUR + minutes) * SECONDS_PER_MINUTE + seconds;
  return assertFrameCount(totalSeconds * nominalRate + frames);
}

function framesToComponents(totalFrames: number, nominalRate: number): TimecodeComponents {
  const framesPerHour = nominalRate * 3600;
  const framesPerMinute = nominalRate * 60;
  const framesPerSecond = nominalRate;

  let remaining = totalFrames;

  const hours = Math.floor(remaining / framesPerHour);
  remaining %= framesPerHour;

  const minutes = Math.floor(remaining / framesPerMinute);
  remaining %= framesPerMinute;

  const seconds = Math.floor(remaining / framesPerSecond);
  remaining %= framesPerSecond;

  return { hours, minutes, seconds, frames: remaining };
}

function capitalise(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

const pad = (n: number) => n.toString().padStart(2, '0');

// ============================================================================
// Timecode
// ============================================================================

export class Timecode {
  readonly frameRate: number;
  private frameCount: number;

  /**
   * Create a timecode from an absolute frame count.
   *
   * @throws TimecodeRangeError for a negative or fractional frame count, or an
   * invalid frame rate
   */
  constructor(totalFrames: number, frameRate: number) {
    this.frameRate = assertFrameRate(frameRate);
    this.frameCount = assertFrameCount(totalFrames);
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  /**
   * Parse an HH:MM:SS:FF string at the given frame rate.
   *
   * @throws TimecodeParseError when the string is not shaped like HH:MM:SS:FF
   * @throws TimecodeRangeError when a component is out of range for the rate
   *
   * @example
   * Timecode.parse('00:00:01:04', 24).totalFrames; // 28
   */
  static parse(text: string, frameRate: number): Timecode {
    const components = Timecode.parseComponents(text);
    return Timecode.fromComponents(components, frameRate);
  }

  static fromTotalFrames(totalFrames: number, frameRate: number): Timecode {
    return new Timecode(totalFrames, frameRate);
  }

  /**
   * Build a timecode from its components. Out-of-range components are
   * rejected, never carried into the next unit.
   */
  static fromComponents(components: TimecodeComponents, frameRate: number): Timecode {
    const nominalRate = nominalFrameRate(assertFrameRate(frameRate));
    validateComponents(components, nominalRate);
    return new Timecode(componentsToFrames(components, nominalRate), frameRate);
  }

  /**
   * Timecode for a real-time duration, rounded to the nearest frame.
   */
  static fromMilliseconds(ms: number, frameRate: number): Timecode {
    assertFrameRate(frameRate);
    return new Timecode(msToFrames(ms, frameRate), frameRate);
  }

  /**
   * Comparator for sorting timecodes by real-time position.
   */
  static compare(a: Timecode, b: Timecode): -1 | 0 | 1 {
    return a.compare(b);
  }

  private static parseComponents(text: string): TimecodeComponents {
    const match = TIMECODE_REGEX.exec(text);
    if (!match) {
      throw new TimecodeParseError(text);
    }

    const [, hours = '', minutes = '', seconds = '', frames = ''] = match;

    return {
      hours: parseInt(hours, 10),
      minutes: parseInt(minutes, 10),
      seconds: parseInt(seconds, 10),
      frames: parseInt(frames, 10),
    };
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get totalFrames(): number {
    return this.frameCount;
  }

  /** The whole rate frame numbers count against (30 for 29.97). */
  get nominalFrameRate(): number {
    return nominalFrameRate(this.frameRate);
  }

  get hours(): number {
    return this.components().hours;
  }

  set hours(value: number) {
    this.replaceComponent('hours', value);
  }

  get minutes(): number {
    return this.components().minutes;
  }

  set minutes(value: number) {
    this.replaceComponent('minutes', value);
  }

  get seconds(): number {
    return this.components().seconds;
  }

  set seconds(value: number) {
    this.replaceComponent('seconds', value);
  }

  get frames(): number {
    return this.components().frames;
  }

  set frames(value: number) {
    this.replaceComponent('frames', value);
  }

  /** Canonical HH:MM:SS:FF form. */
  get timecode(): string {
    const { hours, minutes, seconds, frames } = this.components();
    return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}:${pad(frames)}`;
  }

  /**
   * Re-read the position from a string at this timecode's own rate.
   */
  set timecode(text: string) {
    const components = Timecode.parseComponents(text);
    validateComponents(components, this.nominalFrameRate);
    this.frameCount = componentsToFrames(components, this.nominalFrameRate);
  }

  components(): TimecodeComponents {
    return framesToComponents(this.frameCount, this.nominalFrameRate);
  }

  /**
   * Swap one component and recompute the frame count with the other three
   * held fixed. Validation happens before anything is written.
   */
  private replaceComponent(name: TimecodeComponent, value: number): void {
    const nominalRate = this.nominalFrameRate;
    validateComponent(name, value, nominalRate);

    const next = { ...this.components(), [name]: value };
    this.frameCount = componentsToFrames(next, nominalRate);
  }

  // --------------------------------------------------------------------------
  // Arithmetic
  // --------------------------------------------------------------------------

  /**
   * Add another timecode, a timecode string or a frame count. The result is
   * at this timecode's frame rate.
   *
   * @example
   * // 2s at 16fps is 48 frames at 24fps
   * Timecode.parse('00:00:01:00', 24).add(Timecode.parse('00:00:02:00', 16)).timecode;
   * // '00:00:03:00'
   */
  add(other: TimecodeOperand): Timecode {
    return new Timecode(this.frameCount + this.operandFrames(other), this.frameRate);
  }

  /**
   * @throws TimecodeRangeError when the result would fall before zero
   */
  subtract(other: TimecodeOperand): Timecode {
    const result = this.frameCount - this.operandFrames(other);

    if (result < 0) {
      throw new TimecodeRangeError(
        `Cannot subtract: result would be negative timecode (${result} frames)`
      );
    }

    return new Timecode(result, this.frameRate);
  }

  /**
   * Scale the frame count by a non-negative factor, rounding half away from
   * zero.
   */
  multiply(factor: number): Timecode {
    if (!Number.isFinite(factor) || factor < 0) {
      throw new TimecodeRangeError(`Multiplier must be a non-negative number, got ${factor}`);
    }

    return new Timecode(roundHalfAwayFromZero(this.frameCount * factor), this.frameRate);
  }

  private operandFrames(other: TimecodeOperand): number {
    if (other instanceof Timecode) {
      return rescaleFrames(other.totalFrames, other.frameRate, this.frameRate);
    }

    if (typeof other === 'string') {
      return Timecode.parse(other, this.frameRate).totalFrames;
    }

    return assertFrameCount(other);
  }

  // --------------------------------------------------------------------------
  // Rate Conversion
  // --------------------------------------------------------------------------

  /**
   * The same real-time position at another frame rate.
   */
  convertTo(frameRate: number): Timecode {
    assertFrameRate(frameRate);
    return new Timecode(rescaleFrames(this.frameCount, this.frameRate, frameRate), frameRate);
  }

  /**
   * The same frame count read at another frame rate. Components change,
   * the frame count does not.
   */
  withFrameRate(frameRate: number): Timecode {
    return new Timecode(this.frameCount, frameRate);
  }

  toMilliseconds(): number {
    return framesToMs(this.frameCount, this.frameRate);
  }

  toSeconds(): number {
    return this.frameCount / this.frameRate;
  }

  // --------------------------------------------------------------------------
  // Comparison
  // --------------------------------------------------------------------------

  /**
   * Compare real-time positions. Both frame counts are brought into a common
   * domain of (this rate × other rate), so a.compare(b) === -b.compare(a)
   * whatever the rates.
   */
  compare(other: Timecode): -1 | 0 | 1 {
    return compareRealTime(this.frameCount, this.frameRate, other.totalFrames, other.frameRate);
  }

  equals(other: Timecode): boolean {
    return this.compare(other) === 0;
  }

  lessThan(other: Timecode): boolean {
    return this.compare(other) < 0;
  }

  lessThanOrEqual(other: Timecode): boolean {
    return this.compare(other) <= 0;
  }

  greaterThan(other: Timecode): boolean {
    return this.compare(other) > 0;
  }

  greaterThanOrEqual(other: Timecode): boolean {
    return this.compare(other) >= 0;
  }

  // --------------------------------------------------------------------------
  // Formatting
  // --------------------------------------------------------------------------

  toString(): string {
    return `Timecode.parse('${this.timecode}', ${this.frameRate})`;
  }

  toJSON(): TimecodeJson {
    return {
      timecode: this.timecode,
      frameRate: this.frameRate,
      totalFrames: this.frameCount,
    };
  }
}
