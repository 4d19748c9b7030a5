/**
 * Time-grain parsing, validation and truncation
 */

import { describe, it, expect } from 'vitest';
import { table, parseTimeGrain, applyGrain, truncateDate, InvalidTimeGrainError } from '../packages/index.js';

const events = table('events', { at: 'timestamp', day: 'date', label: 'string' })
  .defineDimension('at', 'at')
  .defineDimension('day', { expr: 'day', smallestTimeGrain: 'TIME_GRAIN_DAY' })
  .defineDimension('label', 'label');

function dimension(name: string) {
  const found = events.dimensions.get(name);
  if (!found) throw new Error(`missing dimension ${name}`);
  return found;
}

describe('parseTimeGrain', () => {
  it('accepts bare and prefixed spellings', () => {
    expect(parseTimeGrain('month')).toBe('month');
    expect(parseTimeGrain('TIME_GRAIN_QUARTER')).toBe('quarter');
    expect(parseTimeGrain(' Week ')).toBe('week');
  });

  it('rejects unknown grains', () => {
    expect(() => parseTimeGrain('fortnight')).toThrow(InvalidTimeGrainError);
  });
});

describe('applyGrain', () => {
  it('wraps the dimension in a truncation', () => {
    expect(applyGrain(dimension('at'), 'hour').resolved).toEqual({
      kind: 'truncate',
      grain: 'hour',
      operand: { kind: 'column', name: 'at' },
    });
  });

  it('allows grains at or above the smallest grain', () => {
    expect(applyGrain(dimension('day'), 'day').resolved.kind).toBe('truncate');
    expect(applyGrain(dimension('day'), 'year').resolved.kind).toBe('truncate');
  });

  it('rejects grains finer than the smallest grain', () => {
    expect(() => applyGrain(dimension('day'), 'hour')).toThrow(
      "Requested grain 'hour' is finer than the smallest grain 'day' of 'events.day'"
    );
  });

  it('rejects non-time dimensions', () => {
    expect(() => applyGrain(dimension('label'), 'day')).toThrow("Dimension 'events.label' is not a time dimension");
  });
});

describe('truncateDate', () => {
  // a Sunday
  const instant = new Date('2024-03-17T13:45:30.250Z');

  it('truncates in UTC at every grain', () => {
    expect(truncateDate(instant, 'second').toISOString()).toBe('2024-03-17T13:45:30.000Z');
    expect(truncateDate(instant, 'minute').toISOString()).toBe('2024-03-17T13:45:00.000Z');
    expect(truncateDate(instant, 'hour').toISOString()).toBe('2024-03-17T13:00:00.000Z');
    expect(truncateDate(instant, 'day').toISOString()).toBe('2024-03-17T00:00:00.000Z');
    expect(truncateDate(instant, 'week').toISOString()).toBe('2024-03-11T00:00:00.000Z');
    expect(truncateDate(instant, 'month').toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(truncateDate(instant, 'quarter').toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(truncateDate(instant, 'year').toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });
});
