/**
 * Tabula Engine - Formula Module Exports
 */

export {
  DEFAULT_MAX_RANGE_CELLS,
  columnToLetters,
  lettersToColumn,
  parseCellAddress,
  isAddressSyntax,
  isCellAddress,
  formatCellAddress,
  normalizeRange,
  parseRangeAddress,
  formatRangeAddress,
  rangeCellCount,
  expandRange,
} from './CellReference.js';
export type { RangeExpansion } from './CellReference.js';

export { tokenize, FormulaSyntaxError } from './Tokenizer.js';
export type { Token, TokenType } from './Tokenizer.js';

export { parseFormula, MAX_NESTING } from './Parser.js';
export type {
  AstNode,
  LiteralNode,
  CellNode,
  RangeNode,
  BinaryNode,
  UnaryNode,
  CallNode,
  BinaryOperator,
  ComparisonOperator,
  UnaryOperator,
  ParseResult,
} from './Parser.js';

export { FunctionRegistry } from './FunctionRegistry.js';
export type {
  FunctionDefinition,
  FunctionImplementation,
  FunctionContext,
  FunctionMetadata,
  FunctionArgInfo,
  FunctionCategory,
} from './FunctionRegistry.js';

export {
  BUILTIN_FUNCTIONS,
  DEFAULT_CIPHER,
  createRegistryWithBuiltins,
  defaultRegistry,
} from './functions/index.js';

export {
  parseLiteral,
  parseNumericText,
  toNumber,
  toText,
  toBoolean,
  compareValues,
} from './values.js';
export type { FunctionArg } from './values.js';

export { FormulaEngine, DEFAULT_EVALUATOR_CONFIG } from './FormulaEngine.js';
export type { EvaluatorConfig, FormulaEngineOptions, EvaluationState } from './FormulaEngine.js';

export { shiftFormulaReferences, shiftReference } from './FormulaAdjust.js';
