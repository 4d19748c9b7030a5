/**
 * Expression language - unified entry point
 */

export {
  parseExpression,
  parseFormula,
  parsePredicate,
  parseExpressionWithErrors,
} from './chevrotain-parser.js';
export type { ParseResult, ParseErrorDetail } from './chevrotain-parser.js';

// Re-export types and helpers
export * from './ast.js';

// Re-export prettifier
export { formatExpr, formatFormula, formatPredicate, formatScalar } from './prettifier.js';
