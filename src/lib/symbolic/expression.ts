/**
 * Symbolic Expression Model
 * Immutable expression trees, smart constructors, and structural comparison
 */

// =============================================================================
// NODE TYPES
// =============================================================================

/** Binary operator tags */
export type BinaryOperator = "add" | "sub" | "mul" | "div" | "pow";

/** Unary operator tags */
export type UnaryOperator = "negate" | "sqrt" | "abs";

/** Expression node variants */
export type ExpressionType = "symbol" | "constant" | "unary" | "binary";

/** Named symbol, e.g. `x` */
export interface SymbolNode {
  readonly type: "symbol";
  readonly name: string;
}

/** Numeric literal (may hold ±Infinity or NaN) */
export interface ConstantNode {
  readonly type: "constant";
  readonly value: number;
}

/** Unary operation node */
export interface UnaryNode {
  readonly type: "unary";
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

/** Binary operation node */
export interface BinaryNode {
  readonly type: "binary";
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

/** Union of all expression node types */
export type Expression = SymbolNode | ConstantNode | UnaryNode | BinaryNode;

/** Anything the constructors accept as an operand */
export type Operand = Expression | number;

/** A variable given by name or as a symbol node */
export type Variable = string | SymbolNode;

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function symbol(name: string): SymbolNode {
  return { type: "symbol", name };
}

export function constant(value: number): ConstantNode {
  return { type: "constant", value };
}

/** Promote a raw number to a constant; expressions pass through */
export function toExpression(operand: Operand): Expression {
  return typeof operand === "number" ? constant(operand) : operand;
}

export function unary(operator: UnaryOperator, operand: Operand): UnaryNode {
  return { type: "unary", operator, operand: toExpression(operand) };
}

export function binary(operator: BinaryOperator, left: Operand, right: Operand): BinaryNode {
  return { type: "binary", operator, left: toExpression(left), right: toExpression(right) };
}

export const add = (left: Operand, right: Operand): BinaryNode => binary("add", left, right);
export const sub = (left: Operand, right: Operand): BinaryNode => binary("sub", left, right);
export const mul = (left: Operand, right: Operand): BinaryNode => binary("mul", left, right);
export const div = (left: Operand, right: Operand): BinaryNode => binary("div", left, right);
export const pow = (left: Operand, right: Operand): BinaryNode => binary("pow", left, right);
export const neg = (operand: Operand): UnaryNode => unary("negate", operand);
export const sqrt = (operand: Operand): UnaryNode => unary("sqrt", operand);
export const abs = (operand: Operand): UnaryNode => unary("abs", operand);

/**
 * Declare several named symbols at once
 *
 * @example
 * const [x, y] = symbols("x", "y");
 * simplify(add(x, x)); // 2 * x
 */
export function symbols(a: string): [SymbolNode];
export function symbols(a: string, b: string): [SymbolNode, SymbolNode];
export function symbols(a: string, b: string, c: string): [SymbolNode, SymbolNode, SymbolNode];
export function symbols(...names: string[]): SymbolNode[];
export function symbols(...names: string[]): SymbolNode[] {
  return names.map((name) => symbol(name));
}

/** Name of a variable given either as a string or a symbol node */
export function variableName(variable: Variable): string {
  return typeof variable === "string" ? variable : variable.name;
}

// =============================================================================
// PREDICATES & COMPARISON
// =============================================================================

/** Check for a constant node, optionally with a specific value */
export function isConstant(expr: Expression, value?: number): expr is ConstantNode {
  return expr.type === "constant" && (value === undefined || expr.value === value);
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Structural equality: same variant, same operator tags, recursively equal
 * children. Symbols compare by name and constants by numeric value.
 */
export function expressionEquals(a: Expression, b: Expression): boolean {
  if (a === b) return true;

  switch (a.type) {
    case "symbol":
      return b.type === "symbol" && a.name === b.name;
    case "constant":
      return b.type === "constant" && sameNumber(a.value, b.value);
    case "unary":
      return b.type === "unary" && a.operator === b.operator && expressionEquals(a.operand, b.operand);
    case "binary":
      return (
        b.type === "binary" &&
        a.operator === b.operator &&
        expressionEquals(a.left, b.left) &&
        expressionEquals(a.right, b.right)
      );
  }
}

const TYPE_RANK: Record<ExpressionType, number> = {
  constant: 0,
  symbol: 1,
  unary: 2,
  binary: 3,
};

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareNumbers(a: number, b: number): number {
  if (sameNumber(a, b)) return 0;
  if (Number.isNaN(a)) return 1;
  if (Number.isNaN(b)) return -1;
  return a < b ? -1 : 1;
}

/**
 * Total order over expression trees
 * Constants sort before symbols, symbols before unary, unary before binary;
 * ties break on value, name, operator, then children left to right.
 * Returns 0 exactly when `expressionEquals(a, b)`.
 */
export function compareExpressions(a: Expression, b: Expression): number {
  const rank = TYPE_RANK[a.type] - TYPE_RANK[b.type];
  if (rank !== 0) return rank;

  if (a.type === "constant" && b.type === "constant") return compareNumbers(a.value, b.value);
  if (a.type === "symbol" && b.type === "symbol") return compareStrings(a.name, b.name);
  if (a.type === "unary" && b.type === "unary") {
    return compareStrings(a.operator, b.operator) || compareExpressions(a.operand, b.operand);
  }
  if (a.type === "binary" && b.type === "binary") {
    return (
      compareStrings(a.operator, b.operator) ||
      compareExpressions(a.left, b.left) ||
      compareExpressions(a.right, b.right)
    );
  }
  return 0;
}
