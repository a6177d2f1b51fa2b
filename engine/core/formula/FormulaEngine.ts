/**
 * Tabula Engine - Formula Evaluator
 *
 * Walks a parsed formula against a grid context. Cell references recurse
 * through the grid, which owns cycle detection; the evaluator owns the
 * other two guards:
 * - Depth: nested formula evaluation deeper than maxDepth yields #DEPTH!
 * - Count: more than maxEvaluations cell descents under one top-level
 *   call yields #LIMIT!
 *
 * Both counters return to zero whenever the outermost evaluate() returns.
 * The evaluator never writes to the grid.
 */

import {
  CellContent,
  CellKey,
  CellRange,
  FormulaErrors,
  FormulaValue,
  GridContext,
  isFormulaError,
  isFormulaText,
  isGuardError,
} from '../types/index.js';
import { DEFAULT_MAX_RANGE_CELLS, expandRange } from './CellReference.js';
import { AstNode, BinaryNode, BinaryOperator, CallNode, UnaryNode, parseFormula } from './Parser.js';
import type { FunctionContext, FunctionRegistry } from './FunctionRegistry.js';
import { defaultRegistry } from './functions/index.js';
import { ModuleBus } from '../dispatch/ModuleBus.js';
import {
  FunctionArg,
  compareValues,
  finite,
  parseLiteral,
  toNumber,
  toText,
} from './values.js';

// =============================================================================
// Configuration
// =============================================================================

export interface EvaluatorConfig {
  /** Deepest nesting of formula evaluations (default: 100) */
  maxDepth?: number;
  /** Largest range a single reference may expand to (default: 10,000) */
  maxRangeCells?: number;
  /** Cell descents allowed under one top-level evaluation (default: 100,000) */
  maxEvaluations?: number;
}

export interface FormulaEngineOptions extends EvaluatorConfig {
  /** Function table (default: the process-wide built-in registry) */
  registry?: FunctionRegistry;
  /** Channel for bridge functions (default: a private, empty bus) */
  bus?: ModuleBus;
}

export const DEFAULT_EVALUATOR_CONFIG: Required<EvaluatorConfig> = {
  maxDepth: 100,
  maxRangeCells: DEFAULT_MAX_RANGE_CELLS,
  maxEvaluations: 100_000,
};

export interface EvaluationState {
  depth: number;
  evaluations: number;
}

// =============================================================================
// Evaluator
// =============================================================================

export class FormulaEngine {
  private grid: GridContext;
  private registry: FunctionRegistry;
  private bus: ModuleBus;
  private config: Required<EvaluatorConfig>;

  private depth = 0;
  private evaluations = 0;

  constructor(grid: GridContext, options: FormulaEngineOptions = {}) {
    this.grid = grid;
    this.registry = options.registry ?? defaultRegistry;
    this.bus = options.bus ?? new ModuleBus();
    this.config = {
      maxDepth: options.maxDepth ?? DEFAULT_EVALUATOR_CONFIG.maxDepth,
      maxRangeCells: options.maxRangeCells ?? DEFAULT_EVALUATOR_CONFIG.maxRangeCells,
      maxEvaluations: options.maxEvaluations ?? DEFAULT_EVALUATOR_CONFIG.maxEvaluations,
    };
  }

  /**
   * Evaluate cell content. Formula text is parsed and walked; anything
   * else is interpreted as a literal.
   *
   * @param visited - Addresses whose evaluation is in flight. Pass the set
   *   received by GridContext.evaluateCell when recursing into a cell.
   */
  evaluate(content: CellContent, visited: Set<CellKey> = new Set()): FormulaValue {
    if (!isFormulaText(content)) {
      return parseLiteral(content);
    }
    if (content.slice(1).trim() === '') {
      return null;
    }

    if (this.depth >= this.config.maxDepth) {
      return FormulaErrors.DEPTH;
    }

    this.depth++;
    try {
      const parsed = parseFormula(content);
      if (!parsed.ok) {
        return FormulaErrors.PARSE;
      }
      return this.evaluateNode(parsed.ast, visited);
    } finally {
      this.depth--;
      if (this.depth === 0) {
        this.evaluations = 0;
      }
    }
  }

  getConfig(): Readonly<Required<EvaluatorConfig>> {
    return this.config;
  }

  getRegistry(): FunctionRegistry {
    return this.registry;
  }

  getBus(): ModuleBus {
    return this.bus;
  }

  /** Guard counters; both are zero between top-level calls */
  getState(): EvaluationState {
    return { depth: this.depth, evaluations: this.evaluations };
  }

  // ===========================================================================
  // Node evaluation
  // ===========================================================================

  private evaluateNode(node: AstNode, visited: Set<CellKey>): FormulaValue {
    switch (node.type) {
      case 'literal':
        return node.value;
      case 'cell':
        return this.resolveCell(node.row, node.col, visited);
      case 'range':
        // A range is only meaningful as a function argument
        return FormulaErrors.VALUE;
      case 'unary':
        return this.evaluateUnary(node, visited);
      case 'binary':
        return this.evaluateBinary(node, visited);
      case 'call':
        return this.evaluateCall(node, visited);
    }
  }

  private resolveCell(row: number, col: number, visited: Set<CellKey>): FormulaValue {
    this.evaluations++;
    if (this.evaluations > this.config.maxEvaluations) {
      return FormulaErrors.LIMIT;
    }
    return this.grid.evaluateCell(row, col, visited);
  }

  /**
   * Values of a range, row-major. Over-ceiling ranges fail with #REF!
   * before any cell is read; a guard error in any cell fails the whole range.
   */
  private resolveRange(range: CellRange, visited: Set<CellKey>): FunctionArg {
    const expansion = expandRange(range, this.config.maxRangeCells);
    if (!expansion.ok) {
      return expansion.error;
    }

    const values: FormulaValue[] = [];
    for (const { row, col } of expansion.cells) {
      const value = this.resolveCell(row, col, visited);
      if (isGuardError(value)) {
        return value;
      }
      values.push(value);
    }
    return values;
  }

  private evaluateUnary(node: UnaryNode, visited: Set<CellKey>): FormulaValue {
    const operand = this.evaluateNode(node.operand, visited);
    if (isFormulaError(operand)) return operand;
    if (node.operator === '+') return operand;

    const n = toNumber(operand);
    if (typeof n === 'string') return n;
    return -n;
  }

  /**
   * Operator chains nest down their left side, so the spine is walked
   * with a loop and only right operands recurse.
   */
  private evaluateBinary(node: BinaryNode, visited: Set<CellKey>): FormulaValue {
    const spine: BinaryNode[] = [node];
    let leftmost: AstNode = node.left;
    while (leftmost.type === 'binary') {
      spine.push(leftmost);
      leftmost = leftmost.left;
    }

    let result = this.evaluateNode(leftmost, visited);
    for (let i = spine.length - 1; i >= 0; i--) {
      if (isFormulaError(result)) return result;
      const current = spine[i];
      const right = this.evaluateNode(current.right, visited);
      if (isFormulaError(right)) return right;
      result = applyBinary(current.operator, result, right);
    }
    return result;
  }

  private evaluateCall(node: CallNode, visited: Set<CellKey>): FormulaValue {
    const definition = this.registry.get(node.name);
    if (!definition) {
      return FormulaErrors.NAME;
    }

    const argCount = node.args.length;
    if (
      (definition.minArgs !== undefined && argCount < definition.minArgs) ||
      (definition.maxArgs !== undefined && argCount > definition.maxArgs)
    ) {
      return FormulaErrors.VALUE;
    }

    const args: FunctionArg[] = [];
    for (const argNode of node.args) {
      const value = argNode.type === 'range'
        ? this.resolveRange(argNode.range, visited)
        : this.evaluateNode(argNode, visited);

      // Guard errors are never handed to a function
      if (isGuardError(value)) return value;
      if (!definition.acceptsErrors && isFormulaError(value)) return value;
      args.push(value);
    }

    return definition.implementation(args, this.createContext(visited));
  }

  private createContext(visited: Set<CellKey>): FunctionContext {
    return {
      evaluate: (content: string) => this.evaluate(content, visited),
      bus: this.bus,
    };
  }
}

function applyBinary(operator: BinaryOperator, left: FormulaValue, right: FormulaValue): FormulaValue {
  switch (operator) {
    case '&':
      return toText(left) + toText(right);
    case '=':
      return compareValues(left, right) === 0;
    case '<>':
      return compareValues(left, right) !== 0;
    case '<':
      return compareValues(left, right) < 0;
    case '>':
      return compareValues(left, right) > 0;
    case '<=':
      return compareValues(left, right) <= 0;
    case '>=':
      return compareValues(left, right) >= 0;
    case '+':
      return arithmetic(left, right, (a, b) => a + b);
    case '-':
      return arithmetic(left, right, (a, b) => a - b);
    case '*':
      return arithmetic(left, right, (a, b) => a * b);
    case '/':
      return arithmetic(left, right, (a, b) => (b === 0 ? FormulaErrors.DIV_ZERO : a / b));
    case '^':
      return arithmetic(left, right, (a, b) => Math.pow(a, b));
  }
}

/**
 * Apply a numeric operator after coercing both operands.
 */
function arithmetic(
  left: FormulaValue,
  right: FormulaValue,
  compute: (a: number, b: number) => number | string
): FormulaValue {
  const a = toNumber(left);
  if (typeof a === 'string') return a;
  const b = toNumber(right);
  if (typeof b === 'string') return b;

  const result = compute(a, b);
  return typeof result === 'string' ? result : finite(result);
}
