/**
 * Calculated-measure algebra
 *
 * Walks formula trees to find the base measures they need and turns a
 * formula into a scalar expression over the columns of the aggregated
 * relation. References resolve against the owning table first, then the
 * whole namespace.
 */

import type { Expr, MeasureExpr } from '../parser/ast.js';
import type { MeasureFieldRef, MeasureLikeRef, SemanticModel } from '../model/semantic-model.js';
import { CalculatedMeasureCycleError, InvalidDefinitionError } from '../errors.js';

export interface FormulaAnalysis {
  /** canonical names of every base measure the formula reads */
  baseMeasures: Map<string, MeasureFieldRef>;
  /** canonical names of base measures read through all(...) */
  grandTotals: Map<string, MeasureFieldRef>;
}

function grandTotalTarget(model: SemanticModel, name: string, owner: string | null): MeasureFieldRef {
  const ref = model.resolveMeasure(name, owner);
  if (ref.kind !== 'measure') {
    throw new InvalidDefinitionError(`all(${name}) must wrap a base measure, not a calculated measure`);
  }
  return ref;
}

/**
 * Collect the base measures and grand totals a formula needs, recursing
 * through referenced calculated measures. Reference cycles throw.
 */
export function analyzeFormula(model: SemanticModel, formula: MeasureExpr, owner: string | null): FormulaAnalysis {
  const analysis: FormulaAnalysis = { baseMeasures: new Map(), grandTotals: new Map() };
  const stack: string[] = [];

  const walk = (node: MeasureExpr, from: string | null): void => {
    switch (node.kind) {
      case 'literal':
        return;
      case 'grandTotal': {
        const target = grandTotalTarget(model, node.of.name, from);
        analysis.baseMeasures.set(target.name, target);
        analysis.grandTotals.set(target.name, target);
        return;
      }
      case 'binary':
        walk(node.left, from);
        walk(node.right, from);
        return;
      case 'measureRef': {
        const ref = model.resolveMeasure(node.name, from);
        if (ref.kind === 'measure') {
          analysis.baseMeasures.set(ref.name, ref);
          return;
        }
        if (stack.includes(ref.name)) {
          throw new CalculatedMeasureCycleError([...stack.slice(stack.indexOf(ref.name)), ref.name]);
        }
        stack.push(ref.name);
        walk(ref.field.formula, ref.table);
        stack.pop();
        return;
      }
    }
  };

  walk(formula, owner);
  return analysis;
}

/** Canonical names of the base measures a formula reads. */
export function neededBaseMeasures(model: SemanticModel, formula: MeasureExpr, owner: string | null = null): Set<string> {
  return new Set(analyzeFormula(model, formula, owner).baseMeasures.keys());
}

/** Canonical names of the base measures a formula reads through all(...), transitively. */
export function collectGrandTotalRefs(model: SemanticModel, formula: MeasureExpr, owner: string | null = null): Set<string> {
  return new Set(analyzeFormula(model, formula, owner).grandTotals.keys());
}

/**
 * Base measures and grand totals needed by a measure-like field: itself, or
 * everything its formula reads.
 */
export function analyzeCalculated(model: SemanticModel, ref: MeasureLikeRef): FormulaAnalysis {
  if (ref.kind === 'measure') {
    return { baseMeasures: new Map([[ref.name, ref]]), grandTotals: new Map() };
  }
  // enter through a reference so the measure itself sits on the cycle stack
  return analyzeFormula(model, { kind: 'measureRef', name: ref.name }, null);
}

export interface FormulaColumns {
  /** column holding the aggregated value of a base measure */
  measure(name: string): string;
  /** column holding the broadcast grand total, undefined when not built */
  total(name: string): string | undefined;
}

/**
 * Turn a formula into a scalar expression over the aggregated relation.
 * Nested calculated measures are inlined; division casts both sides to
 * double so integer sums divide exactly.
 */
export function evaluateFormula(
  model: SemanticModel,
  formula: MeasureExpr,
  owner: string | null,
  columns: FormulaColumns
): Expr {
  switch (formula.kind) {
    case 'literal':
      return { kind: 'literal', value: formula.value };
    case 'measureRef': {
      const ref = model.resolveMeasure(formula.name, owner);
      if (ref.kind === 'measure') return { kind: 'column', name: columns.measure(ref.name) };
      return evaluateFormula(model, ref.field.formula, ref.table, columns);
    }
    case 'grandTotal': {
      const target = grandTotalTarget(model, formula.of.name, owner);
      const column = columns.total(target.name);
      if (column === undefined) {
        throw new InvalidDefinitionError(`Grand total of '${target.name}' is not available in this relation`);
      }
      return { kind: 'column', name: column };
    }
    case 'binary': {
      const left = evaluateFormula(model, formula.left, owner, columns);
      const right = evaluateFormula(model, formula.right, owner, columns);
      if (formula.op === 'div') {
        return {
          kind: 'binary',
          op: 'div',
          left: { kind: 'cast', to: 'double', operand: left },
          right: { kind: 'cast', to: 'double', operand: right },
        };
      }
      return { kind: 'binary', op: formula.op, left, right };
    }
  }
}
