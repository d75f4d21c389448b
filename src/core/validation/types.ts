/**
 * Validation type definitions.
 */
import type { MethodSignature } from '../model/types.js';

/**
 * A pure check over one method. Returns a failure message, or undefined when
 * the method passes. Predicates share no state and may run in any pipeline.
 */
export type MethodPredicate = (method: MethodSignature) => string | undefined;

/**
 * A method that failed validation and the first predicate it failed.
 */
export interface MethodFailure {
  method: string;
  message: string;
}
