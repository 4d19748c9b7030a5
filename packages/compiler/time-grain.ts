/**
 * Time-grain transformer
 *
 * Truncates time dimensions to a requested grain. Truncation happens in UTC
 * and weeks start on Monday.
 */

import { TIME_GRAINS, type TimeGrain } from '../parser/ast.js';
import type { Dimension } from '../model/source-table.js';
import { InvalidTimeGrainError } from '../errors.js';

export { TIME_GRAINS };
export type { TimeGrain };

function isTimeGrain(value: string): value is TimeGrain {
  return TIME_GRAINS.some((grain) => grain === value);
}

/**
 * Accepts `month`, `MONTH` or `TIME_GRAIN_MONTH`.
 */
export function parseTimeGrain(literal: string): TimeGrain {
  const normalized = literal.trim().toLowerCase().replace(/^time_grain_/, '');
  if (!isTimeGrain(normalized)) {
    throw new InvalidTimeGrainError(
      `Unknown time grain '${literal}'; expected one of ${TIME_GRAINS.map((g) => `TIME_GRAIN_${g.toUpperCase()}`).join(', ')}`
    );
  }
  return normalized;
}

export function isFinerThan(grain: TimeGrain, other: TimeGrain): boolean {
  return TIME_GRAINS.indexOf(grain) < TIME_GRAINS.indexOf(other);
}

/**
 * Return a copy of `dimension` whose expression is truncated to `grain`.
 */
export function applyGrain(dimension: Dimension, grain: TimeGrain | string): Dimension {
  const target = parseTimeGrain(grain);
  const label = `${dimension.table}.${dimension.name}`;

  if (!dimension.isTimeDimension) {
    throw new InvalidTimeGrainError(`Dimension '${label}' is not a time dimension`);
  }
  if (dimension.smallestTimeGrain && isFinerThan(target, dimension.smallestTimeGrain)) {
    throw new InvalidTimeGrainError(
      `Requested grain '${target}' is finer than the smallest grain '${dimension.smallestTimeGrain}' of '${label}'`
    );
  }

  return {
    ...dimension,
    expr: { kind: 'truncate', grain: target, operand: dimension.expr },
    resolved: { kind: 'truncate', grain: target, operand: dimension.resolved },
  };
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function truncateDate(value: Date, grain: TimeGrain): Date {
  const year = value.getUTCFullYear();
  const month = value.getUTCMonth();
  const day = value.getUTCDate();

  switch (grain) {
    case 'second':
      return new Date(Math.floor(value.getTime() / 1000) * 1000);
    case 'minute':
      return new Date(Date.UTC(year, month, day, value.getUTCHours(), value.getUTCMinutes()));
    case 'hour':
      return new Date(Date.UTC(year, month, day, value.getUTCHours()));
    case 'day':
      return new Date(Date.UTC(year, month, day));
    case 'week': {
      const sinceMonday = (value.getUTCDay() + 6) % 7;
      return new Date(Date.UTC(year, month, day) - sinceMonday * DAY_MS);
    }
    case 'month':
      return new Date(Date.UTC(year, month, 1));
    case 'quarter':
      return new Date(Date.UTC(year, month - (month % 3), 1));
    case 'year':
      return new Date(Date.UTC(year, 0, 1));
  }
}
