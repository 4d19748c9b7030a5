/**
 * Configuration precedence: explicit options, then environment, then defaults
 */

import { describe, it, expect, vi } from 'vitest';
import { resolveOptions, createSqlBackend, scan, InvalidRequestError } from '../packages/index.js';

describe('resolveOptions', () => {
  it('falls back to defaults', () => {
    const options = resolveOptions({}, {});
    expect(options.projectionPushdown).toBe(true);
    expect(options.debug).toBe(false);
    expect(options.maxLimit).toBeUndefined();
    expect(options.logger).toBe(console);
  });

  it('reads the environment', () => {
    const options = resolveOptions(
      {},
      { CHASMLESS_DEBUG: '1', CHASMLESS_PROJECTION_PUSHDOWN: 'false', CHASMLESS_MAX_LIMIT: '500' }
    );
    expect(options.debug).toBe(true);
    expect(options.projectionPushdown).toBe(false);
    expect(options.maxLimit).toBe(500);
  });

  it('prefers explicit options over the environment', () => {
    const options = resolveOptions(
      { debug: false, projectionPushdown: true, maxLimit: 10 },
      { CHASMLESS_DEBUG: 'true', CHASMLESS_PROJECTION_PUSHDOWN: '0', CHASMLESS_MAX_LIMIT: '500' }
    );
    expect(options).toMatchObject({ debug: false, projectionPushdown: true, maxLimit: 10 });
  });

  it('ignores unrecognised flag values', () => {
    expect(resolveOptions({}, { CHASMLESS_DEBUG: 'yes' }).debug).toBe(false);
  });

  it('rejects a limit that is not a positive integer', () => {
    expect(() => resolveOptions({}, { CHASMLESS_MAX_LIMIT: 'ten' })).toThrow(
      "CHASMLESS_MAX_LIMIT must be a positive integer, got 'ten'"
    );
    expect(() => resolveOptions({ maxLimit: 0 }, {})).toThrow(InvalidRequestError);
  });
});

describe('SqlBackend', () => {
  it('sends generated SQL to the connection and logs it when asked', async () => {
    const runSQL = vi.fn(async (_sql: string) => ({ rows: [{ 'a.x': 1 }] }));
    const debug = vi.fn();
    const sqlBackend = createSqlBackend({ runSQL }, { logSql: true, logger: { debug } });

    const rows = await sqlBackend.execute(scan('a', ['x']));

    expect(rows).toEqual([{ 'a.x': 1 }]);
    expect(runSQL).toHaveBeenCalledWith('SELECT "x" AS "a.x" FROM "a"');
    expect(debug).toHaveBeenCalledWith('Executing SQL:\nSELECT "x" AS "a.x" FROM "a"');
  });
});
