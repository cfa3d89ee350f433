/**
 * Frame rate utilities.
 *
 * Every timecode counts frames against a nominal (whole) frame rate: 24, 25,
 * 30 and so on. Fractional broadcast rates such as 23.976 or 29.97 count
 * against their rounded rate, while the exact rate is what converts a frame
 * count into real time and between rates.
 *
 * Rounding is always half away from zero, so that a rescaled or multiplied
 * frame count that lands exactly between two frames moves to the later one
 * for positive values.
 */

import { TimecodeRangeError } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

const MILLISECONDS_PER_SECOND = 1000;

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a frame rate and return it unchanged.
 *
 * @throws TimecodeRangeError when the rate is not a positive finite number,
 * or rounds to fewer than one frame per second
 */
export function assertFrameRate(frameRate: number): number {
  if (!Number.isFinite(frameRate) || frameRate <= 0) {
    throw new TimecodeRangeError(`Frame rate must be a positive number, got ${frameRate}`);
  }

  if (nominalFrameRate(frameRate) < 1) {
    throw new TimecodeRangeError(`Frame rate ${frameRate} is below 1 frame per second`);
  }

  return frameRate;
}

/**
 * Validate a frame count: a non-negative safe integer.
 */
export function assertFrameCount(totalFrames: number): number {
  if (!Number.isSafeInteger(totalFrames) || totalFrames < 0) {
    throw new TimecodeRangeError(
      `Total frames must be a non-negative integer, got ${totalFrames}`
    );
  }

  return totalFrames;
}

/**
 * The whole frame rate that frame numbers count against.
 *
 * @example
 * nominalFrameRate(29.97); // 30
 */
export function nominalFrameRate(frameRate: number): number {
  return Math.round(frameRate);
}

// ============================================================================
// Rounding & Rescaling
// ============================================================================

/**
 * Round to the nearest integer, ties away from zero.
 *
 * Math.round sends -2.5 to -2; this sends it to -3.
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.round(Math.abs(value));
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

/**
 * Convert a frame count from one rate's domain into another's, keeping the
 * same position in real time.
 *
 * @example
 * // 32 frames at 16fps is two seconds, which is 48 frames at 24fps
 * rescaleFrames(32, 16, 24); // 48
 */
export function rescaleFrames(frames: number, fromRate: number, toRate: number): number {
  if (fromRate === toRate) {
    return frames;
  }

  if (Number.isInteger(frames) && Number.isInteger(fromRate) && Number.isInteger(toRate)) {
    return Number(divideRoundingHalfAway(BigInt(frames) * BigInt(toRate), BigInt(fromRate)));
  }

  return roundHalfAwayFromZero((frames * toRate) / fromRate);
}

/**
 * Order two real-time positions given as frame counts at their own rates.
 *
 * framesA / rateA is compared with framesB / rateB by cross-multiplying,
 * in BigInt for whole numbers so that products past 2^53 stay exact.
 */
export function compareRealTime(
  framesA: number,
  rateA: number,
  framesB: number,
  rateB: number
): -1 | 0 | 1 {
  let left: number | bigint = framesA;
  let right: number | bigint = framesB;

  if (rateA !== rateB) {
    if ([framesA, rateA, framesB, rateB].every(Number.isInteger)) {
      left = BigInt(framesA) * BigInt(rateB);
      right = BigInt(framesB) * BigInt(rateA);
    } else {
      left = framesA * rateB;
      right = framesB * rateA;
    }
  }

  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function divideRoundingHalfAway(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let quotient = n / d;
  if ((n % d) * 2n >= d) {
    quotient += 1n;
  }

  return negative ? -quotient : quotient;
}

// ============================================================================
// Real-time Conversion
// ============================================================================

/**
 * Convert a frame count to milliseconds.
 */
export function framesToMs(frames: number, frameRate: number): number {
  return (frames * MILLISECONDS_PER_SECOND) / frameRate;
}

/**
 * Convert milliseconds to frame count (rounded to nearest frame).
 */
export function msToFrames(ms: number, frameRate: number): number {
  return roundHalfAwayFromZero((ms * frameRate) / MILLISECONDS_PER_SECOND);
}
