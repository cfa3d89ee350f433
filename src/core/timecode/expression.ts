/**
 * Timecode expression evaluator.
 *
 * Evaluates strictly left to right, without precedence:
 *
 *   01:00:00:00@24 + 00:00:02:00@16 * 2
 *
 * reads as ((01:00:00:00@24 + 00:00:02:00@16) * 2). An operand without an
 * `@rate` suffix takes the default rate. The right side of `+` or `-` may also
 * be a bare frame count; the right side of `*` must be a number.
 */

import { Timecode, type TimecodeOperand } from './timecode.js';

// ============================================================================
// Types
// ============================================================================

export type ExpressionToken =
  | { kind: 'timecode'; text: string; frameRate: number | null; position: number }
  | { kind: 'number'; value: number; position: number }
  | { kind: 'operator'; operator: '+' | '-' | '*'; position: number };

export interface EvaluateOptions {
  /** Rate for timecode operands written without `@rate` */
  defaultFrameRate: number;
}

// ============================================================================
// Errors
// ============================================================================

export class ExpressionError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = 'ExpressionError';
    this.position = position;
    Error.captureStackTrace?.(this, ExpressionError);
  }
}

// ============================================================================
// Tokeniser
// ============================================================================

const TOKEN_REGEX =
  /\s*(?:(\d{2,}:\d{2}:\d{2}:\d{2,})(?:@(\d+(?:\.\d+)?))?|([+\-*])|(\d+(?:\.\d+)?))\s*/y;

export function tokenise(source: string): ExpressionToken[] {
  const tokens: ExpressionToken[] = [];
  if (source.trim() === '') {
    return tokens;
  }

  TOKEN_REGEX.lastIndex = 0;

  while (TOKEN_REGEX.lastIndex < source.length) {
    const position = TOKEN_REGEX.lastIndex;
    const match = TOKEN_REGEX.exec(source);

    if (!match) {
      throw new ExpressionError(`Unexpected input "${source.slice(position)}"`, position);
    }

    const [, timecode, rate, operator, number] = match;

    if (timecode !== undefined) {
      tokens.push({
        kind: 'timecode',
        text: timecode,
        frameRate: rate === undefined ? null : parseFloat(rate),
        position,
      });
    } else if (operator === '+' || operator === '-' || operator === '*') {
      tokens.push({ kind: 'operator', operator, position });
    } else if (number !== undefined) {
      tokens.push({ kind: 'number', value: parseFloat(number), position });
    }
  }

  return tokens;
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluate an expression to a single timecode.
 *
 * @throws ExpressionError for malformed expressions; TimecodeParseError and
 * TimecodeRangeError pass through from the arithmetic
 *
 * @example
 * evaluateExpression('00:00:00:20@24 * 2', { defaultFrameRate: 24 }).timecode;
 * // '00:00:01:16'
 */
export function evaluateExpression(source: string, options: EvaluateOptions): Timecode {
  const tokens = tokenise(source);
  const first = tokens[0];

  if (!first) {
    throw new ExpressionError('Empty expression', 0);
  }

  if (first.kind !== 'timecode') {
    throw new ExpressionError('Expression must start with a timecode', first.position);
  }

  let result = toTimecode(first, options);

  for (let i = 1; i < tokens.length; i += 2) {
    const operator = tokens[i];
    const operand = tokens[i + 1];

    if (!operator || operator.kind !== 'operator') {
      throw new ExpressionError('Expected an operator', operator?.position ?? source.length);
    }

    if (!operand || operand.kind === 'operator') {
      throw new ExpressionError(
        `Missing operand after "${operator.operator}"`,
        operand?.position ?? source.length
      );
    }

    if (operator.operator === '*') {
      if (operand.kind !== 'number') {
        throw new ExpressionError('Timecodes can only be multiplied by a number', operand.position);
      }
      result = result.multiply(operand.value);
      continue;
    }

    const value: TimecodeOperand =
      operand.kind === 'number' ? toFrameCount(operand.value, operand.position) : toTimecode(operand, options);

    result = operator.operator === '+' ? result.add(value) : result.subtract(value);
  }

  return result;
}

function toTimecode(
  token: Extract<ExpressionToken, { kind: 'timecode' }>,
  options: EvaluateOptions
): Timecode {
  return Timecode.parse(token.text, token.frameRate ?? options.defaultFrameRate);
}

function toFrameCount(value: number, position: number): number {
  if (!Number.isInteger(value)) {
    throw new ExpressionError(`Frame count must be a whole number, got ${value}`, position);
  }
  return value;
}
