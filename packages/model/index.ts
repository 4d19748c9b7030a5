/**
 * model package - source tables, join trees and the merged field namespace
 */

export { SourceTable, table, assertValidName } from './source-table.js';
export type {
  ScalarType,
  StructType,
  ArrayType,
  ColumnType,
  Dimension,
  Measure,
  CalculatedMeasure,
  DimensionOptions,
  MeasureOptions,
  DimensionInput,
  MeasureInput,
  CalculatedMeasureInput,
} from './source-table.js';

export { join, joinOne, joinMany, joinCross, leaf, leaves, hopKeys, isToOne, TableGraph } from './join-tree.js';
export type {
  Cardinality,
  ColumnRef,
  JoinKey,
  JoinKeyInput,
  LeafNode,
  JoinNode,
  JoinTree,
  TableEdge,
  Hop,
} from './join-tree.js';

export { SemanticModel, createModel } from './semantic-model.js';
export type {
  FieldRef,
  DimensionRef,
  MeasureFieldRef,
  CalculatedRef,
  MeasureLikeRef,
  FieldDescription,
  DimensionDescription,
  MeasureDescription,
  ModelDescription,
} from './semantic-model.js';
