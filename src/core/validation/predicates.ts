/**
 * Shipped method predicates.
 */
import type { MethodPredicate } from './types.js';
import { terminalError } from '../model/types.js';

/**
 * The first parameter must be the context-carrier.
 */
export const requireContextFirst: MethodPredicate = (method) => {
  if (method.parameters.length === 0 || method.parameters[0].type.kind !== 'context') {
    return 'first parameter must be the context type';
  }
  return undefined;
};

/**
 * The method must return a Promise; every pattern awaits the delegate.
 */
export const requireAsyncResult: MethodPredicate = (method) =>
  method.async ? undefined : `must return a Promise, found '${method.returnTypeText}'`;

/**
 * The last result must be a nullable error.
 */
export const requireTerminalError: MethodPredicate = (method) =>
  terminalError(method) ? undefined : 'last result must be a nullable error';

/**
 * The method must produce exactly `count` results.
 */
export function requireResultCount(count: number): MethodPredicate {
  return (method) =>
    method.results.length === count
      ? undefined
      : `must return exactly ${count} result(s), found ${method.results.length}`;
}

/**
 * Predicates every generation run registers.
 */
export const DEFAULT_PREDICATES: readonly MethodPredicate[] = [requireContextFirst, requireAsyncResult];
