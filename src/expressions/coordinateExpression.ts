/**
 * Coordinate expressions
 * 
 * Compiles text such as `x`, `h - y` or `sin(x / w * 2 * pi) * 20` into a
 * CoordinateFunction of (x, y, w, h). Evaluation is done by mathjs in
 * predictable mode, so out-of-domain calls give NaN instead of complex values.
 */

import { all, create, type EvalFunction } from 'mathjs';
import type { Axis, CoordinateFunction, CoordinateFunctions } from '../geometry/types.js';
import { ExpressionError } from '../geometry/errors.js';

const math = create(all, { predictable: true });

/** Sample point used to validate an expression once at compile time */
const PROBE_SCOPE = { x: 0, y: 0, w: 1, h: 1 };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export interface CoordinateExpressions {
  xExpression: string;
  yExpression: string;
  zExpression: string;
}

/**
 * Compile one coordinate expression
 * 
 * @throws ExpressionError if the text does not parse, references anything but
 *   x, y, w, h and mathjs functions/constants, or does not produce a number
 */
export function compileCoordinateExpression(axis: Axis, expression: string): CoordinateFunction {
  if (expression.trim() === '') {
    throw new ExpressionError(axis, 'expression is empty');
  }

  let compiled: EvalFunction;
  let probe: unknown;
  try {
    compiled = math.compile(expression);
    probe = compiled.evaluate({ ...PROBE_SCOPE });
  } catch (error) {
    throw new ExpressionError(axis, describe(error));
  }

  if (typeof probe !== 'number') {
    throw new ExpressionError(axis, `expression must produce a number, got ${math.typeOf(probe)}`);
  }

  return (x, y, w, h) => {
    const value: unknown = compiled.evaluate({ x, y, w, h });
    return typeof value === 'number' ? value : Number.NaN;
  };
}

export function compileCoordinateExpressions(expressions: CoordinateExpressions): CoordinateFunctions {
  return {
    x: compileCoordinateExpression('x', expressions.xExpression),
    y: compileCoordinateExpression('y', expressions.yExpression),
    z: compileCoordinateExpression('z', expressions.zExpression)
  };
}
