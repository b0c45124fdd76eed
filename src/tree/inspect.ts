/**
 * Helpers for inspecting decoded response trees.
 *
 * @module tree/inspect
 */

import type { z } from 'zod';
import { TreeCoercionError } from '../errors/index.js';
import { defaultLogger, type Logger } from '../observability/index.js';
import type { PropertyTree } from './property-tree.js';

const inspectLogger = defaultLogger.child({ component: 'HttpClient' });

/**
 * Whether `name` is a direct child of `tree`.
 */
export function ptreeHasChild(tree: PropertyTree, name: string): boolean {
  return tree.hasChild(name);
}

/**
 * Looks for the error payloads an upstream service returns, logging what it
 * finds. Checked in order:
 *
 * 1. `info` together with `traceback` (an unhandled server exception)
 * 2. `djerror`
 * 3. `error` (also what the JSON helpers return for a non-200 status)
 *
 * A missing tree counts as an error.
 *
 * @returns `true` if an error payload was found.
 */
export function checkDjangoError(
  tree: PropertyTree | null | undefined,
  logger: Logger = inspectLogger
): boolean {
  if (!tree) {
    logger.error('JSON Error: null property tree');
    return true;
  }

  const info = tree.child('info');
  const traceback = tree.child('traceback');
  if (info && traceback) {
    logger.error(`Django error: ${info.value}`);
    logger.error(`    traceback: ${traceback.value}`);
    return true;
  }

  const djerror = tree.child('djerror');
  if (djerror) {
    logger.error(`Django error: ${djerror.value}`);
    return true;
  }

  const error = tree.child('error');
  if (error) {
    logger.error(`HTTP Error: ${error.value}`);
    return true;
  }

  return false;
}

/**
 * Converts the value of every direct child of `tree` with `coerce` and
 * appends the results to `out`, in tree order. Meant for JSON arrays of
 * scalars of one type.
 *
 * All values are converted before any is appended, so `out` is unchanged when
 * one fails.
 *
 * @returns The number of values appended.
 * @throws {TreeCoercionError} If a value does not convert.
 *
 * @example
 * ```typescript
 * const ids: number[] = [];
 * ptreeVector(PropertyTree.fromJson('[1,2,3]'), ids, TreeValue.integer); // 3
 * ```
 */
export function ptreeVector<S extends z.ZodTypeAny>(
  tree: PropertyTree,
  out: Array<z.output<S>>,
  coerce: S
): number {
  const converted: Array<z.output<S>> = [];
  let index = 0;
  for (const [key, child] of tree) {
    try {
      converted.push(child.getValue(coerce));
    } catch (error) {
      if (error instanceof TreeCoercionError) {
        throw new TreeCoercionError(child.value, error.reason, { key, index, cause: error });
      }
      throw error;
    }
    index++;
  }
  out.push(...converted);
  return converted.length;
}
