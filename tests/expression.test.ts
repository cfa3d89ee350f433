/**
 * Timecode expression tests.
 */

import { describe, it, expect } from 'vitest';
import { evaluateExpression, tokenise, ExpressionError } from '../src/core/timecode/expression.js';
import { TimecodeRangeError } from '../src/core/timecode/errors.js';

const at24 = { defaultFrameRate: 24 };

describe('tokenise', () => {
  it('splits timecodes, operators and numbers', () => {
    expect(tokenise('01:00:00:00@23.976 * 2')).toEqual([
      { kind: 'timecode', text: '01:00:00:00', frameRate: 23.976, position: 0 },
      { kind: 'operator', operator: '*', position: 19 },
      { kind: 'number', value: 2, position: 21 },
    ]);
  });

  it('leaves the rate empty when not written', () => {
    expect(tokenise('00:00:01:00')).toEqual([
      { kind: 'timecode', text: '00:00:01:00', frameRate: null, position: 0 },
    ]);
  });

  it('returns nothing for blank input', () => {
    expect(tokenise('   ')).toEqual([]);
  });

  it('rejects unknown characters', () => {
    expect(() => tokenise('00:00:01:00 / 2')).toThrow('Unexpected input "/ 2" at position 12');
  });
});

describe('evaluateExpression', () => {
  it('multiplies by a scalar', () => {
    expect(evaluateExpression('00:00:00:20@24 * 2', at24).timecode).toBe('00:00:01:16');
  });

  it('adds across rates in the left rate', () => {
    const result = evaluateExpression('00:00:01:00@24 + 00:00:02:00@16', at24);
    expect(result.totalFrames).toBe(72);
    expect(result.frameRate).toBe(24);
  });

  it('works without spaces', () => {
    expect(evaluateExpression('00:00:01:00@24+00:00:02:00@16', at24).totalFrames).toBe(72);
  });

  it('evaluates left to right', () => {
    expect(evaluateExpression('00:00:01:00 + 00:00:01:00 * 2', at24).timecode).toBe('00:00:04:00');
  });

  it('applies the default rate to bare timecodes', () => {
    const result = evaluateExpression('00:00:01:00 + 00:00:00:12', { defaultFrameRate: 25 });
    expect(result.totalFrames).toBe(37);
    expect(result.frameRate).toBe(25);
  });

  it('treats bare numbers after + and - as frame counts', () => {
    expect(evaluateExpression('00:00:01:00 + 6', at24).timecode).toBe('00:00:01:06');
    expect(evaluateExpression('00:00:01:00 - 24', at24).timecode).toBe('00:00:00:00');
  });

  it('returns a lone timecode unchanged', () => {
    expect(evaluateExpression('00:00:02:00@16', at24).toString()).toBe(
      "Timecode.parse('00:00:02:00', 16)"
    );
  });

  it('reports malformed expressions with a position', () => {
    expect(() => evaluateExpression('', at24)).toThrow('Empty expression at position 0');
    expect(() => evaluateExpression('+ 00:00:01:00', at24)).toThrow(
      'Expression must start with a timecode at position 0'
    );
    expect(() => evaluateExpression('00:00:01:00 +', at24)).toThrow(
      'Missing operand after "+" at position 13'
    );
    expect(() => evaluateExpression('00:00:01:00 00:00:02:00', at24)).toThrow(
      'Expected an operator at position 12'
    );
    expect(() => evaluateExpression('00:00:01:00 * 00:00:01:00', at24)).toThrow(
      'Timecodes can only be multiplied by a number at position 14'
    );
    expect(() => evaluateExpression('00:00:01:00 + 1.5', at24)).toThrow(
      'Frame count must be a whole number, got 1.5 at position 14'
    );
  });

  it('raises ExpressionError for syntax problems', () => {
    expect(() => evaluateExpression('00:00:01:00 + +', at24)).toThrow(ExpressionError);
  });

  it('passes arithmetic errors through', () => {
    expect(() => evaluateExpression('00:00:00:05 - 00:00:00:10', at24)).toThrow(TimecodeRangeError);
    expect(() => evaluateExpression('00:00:00:30@24', at24)).toThrow(TimecodeRangeError);
  });
});
