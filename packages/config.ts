/**
 * Compiler configuration
 *
 * Options are merged in priority order:
 * 1. Explicit options passed by the caller
 * 2. Environment variables (CHASMLESS_DEBUG, CHASMLESS_PROJECTION_PUSHDOWN, CHASMLESS_MAX_LIMIT)
 * 3. Defaults
 */

import type { ExecutionBackend } from './compiler/plan.js';
import { InvalidRequestError } from './errors.js';

/** The subset of `console` the compiler writes to. */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export interface CompilerOptions {
  /** Read only the columns a query needs (default: true) */
  projectionPushdown?: boolean;
  /** Upper bound applied to every request's limit */
  maxLimit?: number;
  /** Log each compiled plan */
  debug?: boolean;
  logger?: Logger;
  /** Backend used by Plan.execute() when none is passed */
  backend?: ExecutionBackend;
}

export interface ResolvedOptions {
  projectionPushdown: boolean;
  maxLimit: number | undefined;
  debug: boolean;
  logger: Logger;
  backend: ExecutionBackend | undefined;
}

type Env = Record<string, string | undefined>;

function envFlag(env: Env, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
}

function positiveInteger(value: number | string | undefined, source: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidRequestError(`${source} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function resolveOptions(options: CompilerOptions = {}, env: Env = process.env): ResolvedOptions {
  return {
    projectionPushdown: options.projectionPushdown ?? envFlag(env, 'CHASMLESS_PROJECTION_PUSHDOWN') ?? true,
    maxLimit:
      options.maxLimit !== undefined
        ? positiveInteger(options.maxLimit, 'maxLimit')
        : positiveInteger(env.CHASMLESS_MAX_LIMIT, 'CHASMLESS_MAX_LIMIT'),
    debug: options.debug ?? envFlag(env, 'CHASMLESS_DEBUG') ?? false,
    logger: options.logger ?? console,
    backend: options.backend,
  };
}
