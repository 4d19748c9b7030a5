/**
 * Expression parser using Chevrotain
 *
 * One lexer and one CST parser cover the three textual forms callers write:
 * scalar/aggregate expressions (dimension and measure bodies), calculated
 * measure formulas, and filter predicates. CST nodes are turned into the AST
 * in ast.ts by the builders at the bottom of this file.
 */

import { createToken, Lexer, CstParser, CstNode, CstElement, IToken, TokenType } from 'chevrotain';
import type {
  AggregateFunction,
  Comparison,
  ComparisonOperator,
  Expr,
  MeasureExpr,
  Predicate,
  Scalar,
  ScalarFunction,
} from './ast.js';
import { ExpressionSyntaxError } from '../errors.js';

// ---
// TOKEN DEFINITIONS
// ---

// Word boundary helper - matches when NOT followed by identifier chars
const WB = '(?![a-zA-Z0-9_])';

const And = createToken({ name: 'And', pattern: new RegExp(`AND${WB}`, 'i') });
const Or = createToken({ name: 'Or', pattern: new RegExp(`OR${WB}`, 'i') });
const Not = createToken({ name: 'Not', pattern: new RegExp(`NOT${WB}`, 'i') });
const In = createToken({ name: 'In', pattern: new RegExp(`IN${WB}`, 'i') });
const ILike = createToken({ name: 'ILike', pattern: new RegExp(`ILIKE${WB}`, 'i') });
const Like = createToken({ name: 'Like', pattern: new RegExp(`LIKE${WB}`, 'i') });
const Is = createToken({ name: 'Is', pattern: new RegExp(`IS${WB}`, 'i') });
const Null = createToken({ name: 'Null', pattern: new RegExp(`NULL${WB}`, 'i') });
const True = createToken({ name: 'True', pattern: new RegExp(`TRUE${WB}`, 'i') });
const False = createToken({ name: 'False', pattern: new RegExp(`FALSE${WB}`, 'i') });
const Distinct = createToken({ name: 'Distinct', pattern: new RegExp(`DISTINCT${WB}`, 'i') });

// Identifier comes after all keywords
const Identifier = createToken({ name: 'Identifier', pattern: /[a-zA-Z_][a-zA-Z0-9_]*/ });

const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /'(?:[^']|'')*'|"[^"]*"/,
});
const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /\d+(?:\.\d+)?/ });

// Comparison operators (longer first)
const CompareOp = createToken({ name: 'CompareOp', pattern: />=|<=|!=|<>|==|=|>|</ });

const Plus = createToken({ name: 'Plus', pattern: /\+/ });
const Minus = createToken({ name: 'Minus', pattern: /-/ });
const Star = createToken({ name: 'Star', pattern: /\*/ });
const Slash = createToken({ name: 'Slash', pattern: /\// });
const LParen = createToken({ name: 'LParen', pattern: /\(/ });
const RParen = createToken({ name: 'RParen', pattern: /\)/ });
const Comma = createToken({ name: 'Comma', pattern: /,/ });
const Dot = createToken({ name: 'Dot', pattern: /\./ });

const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// Token order matters! Keywords before Identifier, ILIKE before LIKE
const allTokens = [
  WhiteSpace,
  And,
  Or,
  Not,
  ILike,
  Like,
  In,
  Is,
  Null,
  True,
  False,
  Distinct,
  Identifier,
  StringLiteral,
  NumberLiteral,
  CompareOp,
  Plus,
  Minus,
  Star,
  Slash,
  LParen,
  RParen,
  Comma,
  Dot,
];

const ExpressionLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

class ExpressionParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // additive level: term ((+|-) term)*
  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.term, { LABEL: 'operands' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Plus, { LABEL: 'operators' }) },
        { ALT: () => this.CONSUME(Minus, { LABEL: 'operators' }) },
      ]);
      this.SUBRULE2(this.term, { LABEL: 'operands' });
    });
  });

  // multiplicative level: factor ((*|/) factor)*
  private term = this.RULE('term', () => {
    this.SUBRULE(this.factor, { LABEL: 'operands' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star, { LABEL: 'operators' }) },
        { ALT: () => this.CONSUME(Slash, { LABEL: 'operators' }) },
      ]);
      this.SUBRULE2(this.factor, { LABEL: 'operands' });
    });
  });

  private factor = this.RULE('factor', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Minus);
          this.SUBRULE(this.factor, { LABEL: 'negated' });
        },
      },
      { ALT: () => this.SUBRULE(this.primary) },
    ]);
  });

  private primary = this.RULE('primary', () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expression, { LABEL: 'inner' });
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.SUBRULE(this.functionCall) },
      { ALT: () => this.SUBRULE(this.columnRef) },
    ]);
  });

  // name(*) | name(DISTINCT expr) | name(expr, ...)
  private functionCall = this.RULE('functionCall', () => {
    this.CONSUME(Identifier, { LABEL: 'name' });
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star) },
        {
          ALT: () => {
            this.CONSUME(Distinct);
            this.SUBRULE(this.expression, { LABEL: 'args' });
          },
        },
        {
          ALT: () => {
            this.SUBRULE2(this.expression, { LABEL: 'args' });
            this.MANY(() => {
              this.CONSUME(Comma);
              this.SUBRULE3(this.expression, { LABEL: 'args' });
            });
          },
        },
      ]);
    });
    this.CONSUME(RParen);
  });

  // dotted name: table.field or field
  private columnRef = this.RULE('columnRef', () => {
    this.CONSUME(Identifier, { LABEL: 'parts' });
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(Identifier, { LABEL: 'parts' });
    });
  });

  public predicate = this.RULE('predicate', () => {
    this.SUBRULE(this.conjunction, { LABEL: 'operands' });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.conjunction, { LABEL: 'operands' });
    });
  });

  private conjunction = this.RULE('conjunction', () => {
    this.SUBRULE(this.predicateAtom, { LABEL: 'operands' });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.predicateAtom, { LABEL: 'operands' });
    });
  });

  private predicateAtom = this.RULE('predicateAtom', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.predicate, { LABEL: 'inner' });
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.SUBRULE(this.comparison) },
    ]);
  });

  private comparison = this.RULE('comparison', () => {
    this.SUBRULE(this.columnRef, { LABEL: 'field' });
    this.OR([
      {
        ALT: () => {
          this.CONSUME(CompareOp);
          this.SUBRULE(this.literal, { LABEL: 'value' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(Is);
          this.OPTION(() => this.CONSUME(Not, { LABEL: 'negated' }));
          this.CONSUME(Null);
        },
      },
      {
        ALT: () => {
          this.OPTION2(() => this.CONSUME2(Not, { LABEL: 'negated' }));
          this.OR2([
            {
              ALT: () => {
                this.CONSUME(In);
                this.CONSUME(LParen);
                this.SUBRULE2(this.literal, { LABEL: 'values' });
                this.MANY(() => {
                  this.CONSUME(Comma);
                  this.SUBRULE3(this.literal, { LABEL: 'values' });
                });
                this.CONSUME(RParen);
              },
            },
            {
              ALT: () => {
                this.CONSUME(Like);
                this.CONSUME(StringLiteral, { LABEL: 'pattern' });
              },
            },
            {
              ALT: () => {
                this.CONSUME(ILike);
                this.CONSUME2(StringLiteral, { LABEL: 'pattern' });
              },
            },
          ]);
        },
      },
    ]);
  });

  private literal = this.RULE('literal', () => {
    this.OR([
      {
        ALT: () => {
          this.OPTION(() => this.CONSUME(Minus));
          this.CONSUME(NumberLiteral);
        },
      },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
    ]);
  });
}

// Singleton parser instance
const parserInstance = new ExpressionParser();

// ---
// CST ACCESS
// ---

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function tokens(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

function nodes(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter((element): element is CstNode => !isToken(element));
}

function has(node: CstNode, key: string): boolean {
  return (node.children[key] ?? []).length > 0;
}

function only(node: CstNode, key: string): CstNode {
  const [first] = nodes(node, key);
  if (!first) {
    throw new Error(`Malformed '${node.name}' node: missing ${key}`);
  }
  return first;
}

function unquote(image: string): string {
  if (image.startsWith("'")) {
    return image.slice(1, -1).replace(/''/g, "'");
  }
  return image.slice(1, -1);
}

function columnName(node: CstNode): string {
  return tokens(node, 'parts')
    .map((t) => t.image)
    .join('.');
}

function literalValue(node: CstNode): Scalar {
  const [number] = tokens(node, 'NumberLiteral');
  if (number) {
    const value = Number(number.image);
    return has(node, 'Minus') ? -value : value;
  }
  const [text] = tokens(node, 'StringLiteral');
  if (text) return unquote(text.image);
  if (has(node, 'True')) return true;
  if (has(node, 'False')) return false;
  return null;
}

// operand/operator lists come back interleaved: a op0 b op1 c
function foldBinary<T>(
  node: CstNode,
  build: (child: CstNode) => T,
  combine: (op: IToken, left: T, right: T) => T
): T {
  const operands = nodes(node, 'operands');
  const operators = tokens(node, 'operators');
  let result = build(operands[0]);
  operators.forEach((op, i) => {
    result = combine(op, result, build(operands[i + 1]));
  });
  return result;
}

function arithmeticOp(token: IToken): 'add' | 'sub' | 'mul' | 'div' {
  const type: TokenType = token.tokenType;
  if (type === Plus) return 'add';
  if (type === Minus) return 'sub';
  if (type === Star) return 'mul';
  return 'div';
}

// ---
// CST TO EXPRESSION AST
// ---

const AGGREGATES: Record<string, AggregateFunction> = {
  sum: 'sum',
  count: 'count',
  count_distinct: 'count_distinct',
  min: 'min',
  max: 'max',
  mean: 'mean',
  avg: 'mean',
};

const SCALAR_FUNCTIONS: Record<string, { fn: ScalarFunction; min: number; max: number }> = {
  lower: { fn: 'lower', min: 1, max: 1 },
  upper: { fn: 'upper', min: 1, max: 1 },
  abs: { fn: 'abs', min: 1, max: 1 },
  round: { fn: 'round', min: 1, max: 2 },
  coalesce: { fn: 'coalesce', min: 1, max: Infinity },
  length: { fn: 'length', min: 1, max: 1 },
  concat: { fn: 'concat', min: 1, max: Infinity },
};

class ExpressionBuilder {
  constructor(private readonly source: string) {}

  expression(node: CstNode): Expr {
    return foldBinary(
      node,
      (child) => this.term(child),
      (op, left, right) => ({ kind: 'binary', op: arithmeticOp(op), left, right })
    );
  }

  private term(node: CstNode): Expr {
    return foldBinary(
      node,
      (child) => this.factor(child),
      (op, left, right) => ({ kind: 'binary', op: arithmeticOp(op), left, right })
    );
  }

  private factor(node: CstNode): Expr {
    if (has(node, 'negated')) {
      const operand = this.factor(only(node, 'negated'));
      // fold -<number> into a literal
      if (operand.kind === 'literal' && typeof operand.value === 'number') {
        return { kind: 'literal', value: -operand.value };
      }
      return { kind: 'negate', operand };
    }
    return this.primary(only(node, 'primary'));
  }

  private primary(node: CstNode): Expr {
    if (has(node, 'inner')) return this.expression(only(node, 'inner'));
    if (has(node, 'functionCall')) return this.functionCall(only(node, 'functionCall'));
    if (has(node, 'columnRef')) return { kind: 'column', name: columnName(only(node, 'columnRef')) };
    return { kind: 'literal', value: literalValue(node) };
  }

  private functionCall(node: CstNode): Expr {
    const [nameToken] = tokens(node, 'name');
    const name = nameToken.image.toLowerCase();
    const args = nodes(node, 'args').map((arg) => this.expression(arg));
    const star = has(node, 'Star');
    const distinct = has(node, 'Distinct');

    const aggregate = AGGREGATES[name];
    if (aggregate) {
      if (aggregate === 'count' && (star || args.length === 0)) {
        return { kind: 'aggregate', fn: 'count', arg: null };
      }
      if (star || args.length !== 1) {
        throw new ExpressionSyntaxError(`${name}() takes exactly one argument`, this.source);
      }
      if (distinct && aggregate !== 'count') {
        throw new ExpressionSyntaxError(`DISTINCT is only supported inside count()`, this.source);
      }
      return { kind: 'aggregate', fn: distinct ? 'count_distinct' : aggregate, arg: args[0] };
    }

    const scalar = SCALAR_FUNCTIONS[name];
    if (!scalar) {
      throw new ExpressionSyntaxError(`Unknown function '${nameToken.image}'`, this.source);
    }
    if (star || distinct || args.length < scalar.min || args.length > scalar.max) {
      throw new ExpressionSyntaxError(`Wrong arguments for ${name}()`, this.source);
    }
    return { kind: 'call', fn: scalar.fn, args };
  }
}

// ---
// CST TO FORMULA AST
// ---

/**
 * Formulas reuse the expression grammar: bare names are measure references,
 * `all(name)` is a grand total, numbers are literals.
 */
class FormulaBuilder {
  constructor(private readonly source: string) {}

  formula(node: CstNode): MeasureExpr {
    return foldBinary(
      node,
      (child) => this.term(child),
      (op, left, right) => ({ kind: 'binary', op: arithmeticOp(op), left, right })
    );
  }

  private term(node: CstNode): MeasureExpr {
    return foldBinary(
      node,
      (child) => this.factor(child),
      (op, left, right) => ({ kind: 'binary', op: arithmeticOp(op), left, right })
    );
  }

  private factor(node: CstNode): MeasureExpr {
    if (has(node, 'negated')) {
      const operand = this.factor(only(node, 'negated'));
      if (operand.kind === 'literal') return { kind: 'literal', value: -operand.value };
      return { kind: 'binary', op: 'mul', left: { kind: 'literal', value: -1 }, right: operand };
    }
    const primary = only(node, 'primary');
    if (has(primary, 'inner')) return this.formula(only(primary, 'inner'));
    if (has(primary, 'columnRef')) {
      return { kind: 'measureRef', name: columnName(only(primary, 'columnRef')) };
    }
    if (has(primary, 'functionCall')) return this.grandTotal(only(primary, 'functionCall'));

    const value = literalValue(primary);
    if (typeof value !== 'number') {
      throw new ExpressionSyntaxError('Formulas only accept numeric literals', this.source);
    }
    return { kind: 'literal', value };
  }

  private grandTotal(node: CstNode): MeasureExpr {
    const [nameToken] = tokens(node, 'name');
    if (nameToken.image.toLowerCase() !== 'all') {
      throw new ExpressionSyntaxError(`Function '${nameToken.image}' is not allowed in a formula`, this.source);
    }
    const args = nodes(node, 'args').map((arg) => new ExpressionBuilder(this.source).expression(arg));
    const [target] = args;
    if (args.length !== 1 || target.kind !== 'column') {
      throw new ExpressionSyntaxError('all() takes exactly one measure name', this.source);
    }
    return { kind: 'grandTotal', of: { kind: 'measureRef', name: target.name } };
  }
}

// ---
// CST TO PREDICATE AST
// ---

const COMPARE_OPS: Record<string, ComparisonOperator> = {
  '=': '=',
  '==': '=',
  '!=': '!=',
  '<>': '!=',
  '>': '>',
  '>=': '>=',
  '<': '<',
  '<=': '<=',
};

function comparisonOperator(image: string): ComparisonOperator {
  const operator = COMPARE_OPS[image];
  if (!operator) throw new Error(`Unexpected comparison operator '${image}'`);
  return operator;
}

function buildPredicate(node: CstNode): Predicate {
  const children = nodes(node, 'operands').map(buildConjunction);
  return children.length === 1 ? children[0] : { type: 'compound', operator: 'OR', children };
}

function buildConjunction(node: CstNode): Predicate {
  const children = nodes(node, 'operands').map(buildAtom);
  return children.length === 1 ? children[0] : { type: 'compound', operator: 'AND', children };
}

function buildAtom(node: CstNode): Predicate {
  if (has(node, 'inner')) return buildPredicate(only(node, 'inner'));
  return buildComparison(only(node, 'comparison'));
}

function buildComparison(node: CstNode): Comparison {
  const field = columnName(only(node, 'field'));
  const negated = has(node, 'negated');

  const [op] = tokens(node, 'CompareOp');
  if (op) {
    return {
      type: 'comparison',
      field,
      operator: comparisonOperator(op.image),
      value: literalValue(only(node, 'value')),
    };
  }
  if (has(node, 'Is')) {
    return { type: 'comparison', field, operator: negated ? 'is not null' : 'is null' };
  }
  if (has(node, 'In')) {
    return {
      type: 'comparison',
      field,
      operator: negated ? 'not in' : 'in',
      values: nodes(node, 'values').map(literalValue),
    };
  }
  const [pattern] = tokens(node, 'pattern');
  const operator: ComparisonOperator = has(node, 'ILike')
    ? negated ? 'not ilike' : 'ilike'
    : negated ? 'not like' : 'like';
  return { type: 'comparison', field, operator, value: unquote(pattern.image) };
}

// ---
// PUBLIC API
// ---

export interface ParseErrorDetail {
  message: string;
  line?: number;
  column?: number;
}

export interface ParseResult<T> {
  ast: T | null;
  lexErrors: ParseErrorDetail[];
  parseErrors: ParseErrorDetail[];
}

function runRule(input: string, rule: 'expression' | 'predicate'): ParseResult<CstNode> {
  const lexResult = ExpressionLexer.tokenize(input);
  const lexErrors = lexResult.errors.map((e) => ({ message: e.message, line: e.line, column: e.column }));

  parserInstance.input = lexResult.tokens;
  const cst = rule === 'expression' ? parserInstance.expression() : parserInstance.predicate();
  const parseErrors = parserInstance.errors.map((e) => ({
    message: e.message,
    line: e.token.startLine,
    column: e.token.startColumn,
  }));

  const ok = lexErrors.length === 0 && parseErrors.length === 0;
  return { ast: ok ? cst : null, lexErrors, parseErrors };
}

function parseOrThrow(input: string, rule: 'expression' | 'predicate'): CstNode {
  const result = runRule(input, rule);
  if (result.lexErrors.length > 0) {
    throw new ExpressionSyntaxError(`Lexer errors: ${result.lexErrors.map((e) => e.message).join(', ')}`, input);
  }
  if (result.ast === null) {
    throw new ExpressionSyntaxError(`Parser errors: ${result.parseErrors.map((e) => e.message).join(', ')}`, input);
  }
  return result.ast;
}

/**
 * Parse a scalar or aggregate expression, e.g. `sum(amount * quantity)`.
 */
export function parseExpression(input: string): Expr {
  return new ExpressionBuilder(input).expression(parseOrThrow(input, 'expression'));
}

/**
 * Parse a calculated-measure formula, e.g. `revenue / all(revenue)`.
 */
export function parseFormula(input: string): MeasureExpr {
  return new FormulaBuilder(input).formula(parseOrThrow(input, 'expression'));
}

/**
 * Parse a filter predicate, e.g. `amount >= 100 AND region in ('West', 'East')`.
 */
export function parsePredicate(input: string): Predicate {
  return buildPredicate(parseOrThrow(input, 'predicate'));
}

/**
 * Parse an expression with full result including errors (for editor tooling).
 */
export function parseExpressionWithErrors(input: string): ParseResult<Expr> {
  const result = runRule(input, 'expression');
  return {
    ast: result.ast ? new ExpressionBuilder(input).expression(result.ast) : null,
    lexErrors: result.lexErrors,
    parseErrors: result.parseErrors,
  };
}

// Export for testing/debugging
export { ExpressionLexer, ExpressionParser };
