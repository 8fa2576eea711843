/**
 * Limit & Singularity Analysis
 *
 * Numeric one-sided limits from a geometric sampling sequence, plus a scan of
 * every denominator over an integer grid to find and classify division
 * singularities. This is a heuristic: only the tail of the sampled sequence is
 * inspected, and only integer points in PROBE_RANGE are probed. Samples closer
 * to the point than PRECISION_FLOOR allows still count toward divergence but
 * never supply a finite value.
 */

import {
  type ConstantNode,
  type Expression,
  type Operand,
  type Variable,
  constant,
  toExpression,
  variableName,
} from "./expression.ts";
import { evaluate } from "./evaluate.ts";

// =============================================================================
// CONSTANTS
// =============================================================================

/** Default distance of the first sample from the target point */
export const DEFAULT_EPSILON = 1e-6;

/** Number of halvings of the approach step */
export const LIMIT_SAMPLE_COUNT = 50;

/** Magnitude beyond which two consecutive samples count as divergent */
export const DIVERGENCE_THRESHOLD = 1e10;

/** A probed denominator below this magnitude is treated as zero */
export const ZERO_TOLERANCE = 1e-10;

/**
 * Offset from the point, relative to its magnitude, below which a sample is
 * dominated by cancellation in double precision
 */
export const PRECISION_FLOOR = 2 ** -26;

/** Significant digits kept in a finite limit (decimal places below 1) */
export const LIMIT_PRECISION = 6;

/** Inclusive integer grid on which denominators are probed */
export const PROBE_RANGE = { min: -10, max: 10 } as const;

// =============================================================================
// TYPES
// =============================================================================

/** Side from which a point is approached */
export type LimitDirection = "left" | "right" | "both";

export type OneSidedDirection = Exclude<LimitDirection, "both">;

/** Classified outcome of a limit */
export type LimitValue =
  | { readonly type: "positive-infinity" }
  | { readonly type: "negative-infinity" }
  | { readonly type: "undefined" }
  | { readonly type: "nan" }
  | { readonly type: "finite"; readonly value: ConstantNode };

/** Left and right limits, in that order */
export type LimitPair = readonly [left: LimitValue, right: LimitValue];

/** Result of evaluating an expression at one point */
export type SampleResult = { success: true; value: number } | { success: false; error: string };

/** One candidate zero of a denominator */
export interface SingularityRecord {
  point: number;
  /** The denominator subtree that vanishes at `point` */
  denominator: Expression;
  leftLimit: LimitValue;
  rightLimit: LimitValue;
  /** Whether both one-sided limits agree */
  continuous: boolean;
}

/** Result of `checkDivisionLimits` */
export interface DivisionAnalysis {
  hasSingularity: boolean;
  singularities: SingularityRecord[];
}

const POSITIVE_INFINITY: LimitValue = { type: "positive-infinity" };
const NEGATIVE_INFINITY: LimitValue = { type: "negative-infinity" };
const UNDEFINED: LimitValue = { type: "undefined" };

/** Compare two limit values; finite values compare by number */
export function limitValuesEqual(a: LimitValue, b: LimitValue): boolean {
  if (a.type === "finite" && b.type === "finite") return a.value.value === b.value.value;
  return a.type === b.type;
}

// =============================================================================
// STRUCTURE
// =============================================================================

/** Denominator of a top-level division, or null */
export function denominator(expr: Expression): Expression | null {
  return expr.type === "binary" && expr.operator === "div" ? expr.right : null;
}

/**
 * Collect the denominator of every division in the tree, pre-order.
 * Denominators are listed whether or not they can vanish; nested divisions
 * may contribute the same subtree more than once.
 */
export function findSingularities(expr: Expression): Expression[] {
  const found: Expression[] = [];

  function findDivisions(node: Expression): void {
    switch (node.type) {
      case "symbol":
      case "constant":
        break;
      case "unary":
        findDivisions(node.operand);
        break;
      case "binary":
        if (node.operator === "div") found.push(node.right);
        findDivisions(node.left);
        findDivisions(node.right);
        break;
    }
  }

  findDivisions(expr);
  return found;
}

// =============================================================================
// SAMPLING
// =============================================================================

/** Evaluate an expression at a point, reporting failure instead of throwing */
export function sampleExpression(expr: Expression, variable: Variable, x: number): SampleResult {
  let result: Expression;
  try {
    result = evaluate(expr, variable, x);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  if (result.type !== "constant") {
    return { success: false, error: `Expression does not reduce to a number at ${x}` };
  }
  return { success: true, value: result.value };
}

/** One point of the approach sequence */
interface Sample {
  offset: number;
  value: number;
}

/** Round a finite limit so that noise in the last digits does not split left from right */
function roundLimitValue(value: number): number {
  const rounded =
    Math.abs(value) < 1
      ? Math.round(value * 10 ** LIMIT_PRECISION) / 10 ** LIMIT_PRECISION
      : Number(value.toPrecision(LIMIT_PRECISION));
  // Fold -0 into 0
  return rounded === 0 ? 0 : rounded;
}

/** Closest sample to the point that is still clear of cancellation noise */
function stableSample(samples: Sample[], floor: number): Sample | undefined {
  for (let i = samples.length - 1; i >= 0; i--) {
    const sample = samples[i];
    if (sample && Math.abs(sample.offset) >= floor) return sample;
  }
  return samples[samples.length - 1];
}

/**
 * Classify a sample sequence. Divergence is read from the last two samples;
 * a finite limit is the rounded value of the closest stable sample.
 */
function classifySamples(samples: Sample[], step: number, floor: number): LimitValue {
  const last = samples[samples.length - 1]?.value;
  const prev = samples[samples.length - 2]?.value;
  if (last === undefined || prev === undefined) return UNDEFINED;

  if (last > DIVERGENCE_THRESHOLD && prev > DIVERGENCE_THRESHOLD) return POSITIVE_INFINITY;
  if (last < -DIVERGENCE_THRESHOLD && prev < -DIVERGENCE_THRESHOLD) return NEGATIVE_INFINITY;

  if (!Number.isFinite(last)) {
    const infinite = Math.abs(last) === Infinity;
    return last > 0 || (infinite && step > 0) ? POSITIVE_INFINITY : NEGATIVE_INFINITY;
  }

  const stable = stableSample(samples, floor)?.value ?? last;
  return { type: "finite", value: constant(roundLimitValue(stable)) };
}

function oneSidedLimit(
  expr: Expression,
  variable: Variable,
  point: number,
  direction: OneSidedDirection,
  epsilon: number,
): LimitValue {
  const step = direction === "left" ? -epsilon : epsilon;
  const floor = Math.abs(point) * PRECISION_FLOOR;
  const samples: Sample[] = [];

  for (let i = 1; i <= LIMIT_SAMPLE_COUNT; i++) {
    const offset = step / 2 ** i;
    const x = point + offset;
    // No closer distinct sample exists in double precision
    if (x === point && samples.length >= 2) break;

    const sample = sampleExpression(expr, variable, x);
    if (!sample.success) return UNDEFINED;
    samples.push({ offset, value: sample.value });
  }

  return classifySamples(samples, step, floor);
}

/**
 * Numeric limit of an expression as `variable` approaches `point`
 *
 * Samples `point ± epsilon / 2^i` for i = 1..LIMIT_SAMPLE_COUNT, stopping once
 * the samples reach the point itself. The last two values decide divergence; a
 * finite limit is taken from the closest sample whose offset is at least
 * `|point| * PRECISION_FLOOR`, rounded to LIMIT_PRECISION digits. Any sample that
 * fails to evaluate, or does not reduce to a number, makes the limit undefined.
 *
 * @example
 * limit(div(1, x), "x", 0, "left");  // { type: "negative-infinity" }
 * limit(div(1, x), "x", 0);          // [negative-infinity, positive-infinity]
 */
export function limit(
  expr: Operand,
  variable: Variable,
  point: number,
  direction?: "both",
  epsilon?: number,
): LimitPair;
export function limit(
  expr: Operand,
  variable: Variable,
  point: number,
  direction: OneSidedDirection,
  epsilon?: number,
): LimitValue;
export function limit(
  expr: Operand,
  variable: Variable,
  point: number,
  direction: LimitDirection,
  epsilon?: number,
): LimitValue | LimitPair;
export function limit(
  expr: Operand,
  variable: Variable,
  point: number,
  direction: LimitDirection = "both",
  epsilon: number = DEFAULT_EPSILON,
): LimitValue | LimitPair {
  const tree = toExpression(expr);
  if (direction === "both") {
    return [
      oneSidedLimit(tree, variable, point, "left", epsilon),
      oneSidedLimit(tree, variable, point, "right", epsilon),
    ];
  }
  return oneSidedLimit(tree, variable, point, direction, epsilon);
}

// =============================================================================
// SINGULARITIES
// =============================================================================

/**
 * Probe every denominator on the integer grid and record the points where it
 * vanishes, with the one-sided limits of the whole expression there.
 *
 * Probe points whose evaluation fails are skipped. Constant denominators are
 * probed like any other, and zeros off the integer grid are never found.
 *
 * @example
 * checkDivisionLimits(div(1, sub(pow(x, 2), 1)), "x");
 * // { hasSingularity: true, singularities: [{ point: -1, ... }, { point: 1, ... }] }
 */
export function checkDivisionLimits(
  expr: Operand,
  variable: Variable,
  epsilon: number = DEFAULT_EPSILON,
): DivisionAnalysis {
  const tree = toExpression(expr);
  const singularities: SingularityRecord[] = [];

  for (const denom of findSingularities(tree)) {
    for (let point = PROBE_RANGE.min; point <= PROBE_RANGE.max; point++) {
      const probe = sampleExpression(denom, variable, point);
      if (!probe.success) continue;
      // NaN is not a zero
      if (!(Math.abs(probe.value) < ZERO_TOLERANCE)) continue;

      const leftLimit = limit(tree, variable, point, "left", epsilon);
      const rightLimit = limit(tree, variable, point, "right", epsilon);
      singularities.push({
        point,
        denominator: denom,
        leftLimit,
        rightLimit,
        continuous: limitValuesEqual(leftLimit, rightLimit),
      });
    }
  }

  return { hasSingularity: singularities.length > 0, singularities };
}

/** Render a limit value for display */
export function formatLimitValue(value: LimitValue): string {
  switch (value.type) {
    case "positive-infinity":
      return "+∞";
    case "negative-infinity":
      return "-∞";
    case "undefined":
      return "undefined";
    case "nan":
      return "NaN";
    case "finite":
      return String(Math.round(value.value.value * 1e4) / 1e4);
  }
}

/**
 * Describe each recorded singularity, one line per point
 *
 * @example
 * describeDivisionAnalysis(checkDivisionLimits(div(1, x), "x"), "x");
 * // "At x=0: Discontinuous - Left limit: -∞, Right limit: +∞"
 */
export function describeDivisionAnalysis(analysis: DivisionAnalysis, variable: Variable): string {
  if (!analysis.hasSingularity) return "No division by zero detected";

  const name = variableName(variable);
  return analysis.singularities
    .map((s) => {
      const left = formatLimitValue(s.leftLimit);
      const right = formatLimitValue(s.rightLimit);
      return s.continuous
        ? `At ${name}=${s.point}: Continuous (left = right = ${left})`
        : `At ${name}=${s.point}: Discontinuous - Left limit: ${left}, Right limit: ${right}`;
    })
    .join("\n");
}

/** Analyze an expression's division singularities and describe them */
export function describeDivisionBehavior(
  expr: Operand,
  variable: Variable,
  epsilon: number = DEFAULT_EPSILON,
): string {
  return describeDivisionAnalysis(checkDivisionLimits(expr, variable, epsilon), variable);
}
