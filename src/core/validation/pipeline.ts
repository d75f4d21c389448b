/**
 * Validation pipeline.
 *
 * Predicates run in registration order. A method stops at its first failing
 * predicate, but every method is checked before the run is rejected, so one
 * error reports all offending methods.
 */
import type { InterfaceModel, MethodSignature } from '../model/types.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { MethodFailure, MethodPredicate } from './types.js';

export class ValidationPipeline {
  private readonly predicates: readonly MethodPredicate[];

  constructor(predicates: readonly MethodPredicate[] = []) {
    this.predicates = [...predicates];
  }

  /**
   * A new pipeline with `predicate` appended. The receiver is unchanged.
   */
  with(predicate: MethodPredicate): ValidationPipeline {
    return new ValidationPipeline([...this.predicates, predicate]);
  }

  get size(): number {
    return this.predicates.length;
  }

  /**
   * Check one method against the predicates, stopping at the first failure.
   */
  validateMethod(method: MethodSignature): MethodFailure | null {
    for (const predicate of this.predicates) {
      const message = predicate(method);
      if (message !== undefined) {
        return { method: method.name, message };
      }
    }
    return null;
  }

  /**
   * Check every method of the interface.
   * @throws ValidationError naming every failing method
   */
  validate(model: InterfaceModel): void {
    const failures: MethodFailure[] = [];
    for (const method of model.methods.values()) {
      const failure = this.validateMethod(method);
      if (failure) {
        failures.push(failure);
      }
    }

    if (failures.length === 0) {
      return;
    }

    const summary = failures
      .map((failure) => `method '${failure.method}': ${failure.message}`)
      .join('; ');
    throw new ValidationError(
      ErrorCodes.METHOD_INVALID,
      `Interface ${model.name} failed validation: ${summary}`,
      { interface: model.name, failures }
    );
  }
}
