/**
 * Naming resolver.
 *
 * Generated parameter and result names depend only on position and on the
 * shape of the parameter list, never on the names written in the source, so
 * output stays stable across runs and renames.
 */
import type { Parameter, Result } from '../model/types.js';

/** Name of the context parameter. */
export const CONTEXT_NAME = 'ctx';

/** Name of the single request parameter in a `(ctx, req)` method. */
export const REQUEST_NAME = 'req';

/** Binding that receives the terminal error. */
export const ERROR_NAME = 'err';

/**
 * Name of the parameter at `index`:
 * `ctx` for a leading context, `req` for the second of exactly two,
 * `param<index>` otherwise.
 */
export function nameOf(index: number, parameters: readonly Parameter[]): string {
  const parameter = parameters[index];
  if (!parameter) {
    throw new RangeError(`No parameter at index ${index} (method has ${parameters.length})`);
  }

  if (index === 0 && parameter.type.kind === 'context') {
    return CONTEXT_NAME;
  }

  if (parameters.length === 2 && index === 1) {
    return REQUEST_NAME;
  }

  return `param${index}`;
}

/**
 * Names of every parameter, in order.
 */
export function parameterNames(parameters: readonly Parameter[]): string[] {
  return parameters.map((_, index) => nameOf(index, parameters));
}

/**
 * Name bound to a result: `err` for the terminal error, `arg<index>` otherwise.
 */
export function resultName(result: Result): string {
  return result.isTerminalError ? ERROR_NAME : `arg${result.index}`;
}

/**
 * Parameter list of a method declaration: `ctx: Context, ...param1: string[]`.
 */
export function renderParameters(parameters: readonly Parameter[]): string {
  return parameters
    .map((parameter, index) => {
      const name = nameOf(index, parameters);
      if (parameter.variadic) {
        return `...${name}: ${parameter.type.text}`;
      }
      return `${name}${parameter.optional ? '?' : ''}: ${parameter.type.text}`;
    })
    .join(', ');
}

/**
 * Argument list forwarding the first `count` parameters (all by default).
 * Rest parameters are spread back out.
 */
export function renderArguments(parameters: readonly Parameter[], count = parameters.length): string {
  return parameters
    .slice(0, count)
    .map((parameter, index) => {
      const name = nameOf(index, parameters);
      return parameter.variadic ? `...${name}` : name;
    })
    .join(', ');
}
