/**
 * Plan executors
 *
 * Plans run either in memory (MemoryBackend) or on a SQL engine the caller
 * connects. A SQL connection is anything with a `runSQL(sql)` method that
 * resolves to `{ rows }`, the shape database drivers and their wrappers
 * return.
 */

import type { Row } from '../parser/ast.js';
import type { ExecutionBackend, PlanNode } from '../compiler/plan.js';
import { generateSQL } from '../compiler/sql-generator.js';
import type { Logger } from '../config.js';

export { MemoryBackend, evaluate, matches } from './memory-backend.js';

// ---
// SQL BACKEND
// ---

export interface SqlConnection {
  runSQL(sql: string): Promise<{ rows: Row[] }>;
}

export interface SqlBackendOptions {
  /** Log each statement before it runs */
  logSql?: boolean;
  logger?: Pick<Logger, 'debug'>;
}

/**
 * Execute plans as SQL against the given connection
 */
export class SqlBackend implements ExecutionBackend {
  constructor(
    private readonly connection: SqlConnection,
    private readonly options: SqlBackendOptions = {}
  ) {}

  async execute(root: PlanNode): Promise<Row[]> {
    const sql = generateSQL(root);
    if (this.options.logSql) {
      (this.options.logger ?? console).debug(`Executing SQL:\n${sql}`);
    }
    const result = await this.connection.runSQL(sql);
    return result.rows;
  }
}

export function createSqlBackend(connection: SqlConnection, options: SqlBackendOptions = {}): SqlBackend {
  return new SqlBackend(connection, options);
}
