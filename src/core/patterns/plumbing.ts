/**
 * Result plumbing shared by every pattern: method declarations, delegate
 * calls, result bindings and the error and success returns.
 */
import { terminalError, type InterfaceModel, type MethodSignature, type Result } from '../model/types.js';
import { ERROR_NAME, renderArguments, renderParameters, resultName } from '../naming/resolver.js';
import { zeroValueOf } from '../zero-value/zero-value.js';
import { ErrorCodes, PatternConfigurationError, ZeroValueError } from '../../utils/errors.js';
import type { DecoratorSpec } from './types.js';

export const GENERATED_MARKER = '// Code generated by wrapgen. DO NOT EDIT.';

export function renderHeader(spec: DecoratorSpec, sourceLabel: string): string[] {
  return [GENERATED_MARKER, `// Source: ${sourceLabel} (interface ${spec.interfaceName}, pattern ${spec.kind})`];
}

/**
 * Indent non-empty lines by `depth` levels of two spaces.
 */
export function indent(lines: readonly string[], depth = 1): string[] {
  const pad = '  '.repeat(depth);
  return lines.map((line) => (line ? `${pad}${line}` : line));
}

/**
 * Methods in name order.
 */
export function sortedMethods(model: InterfaceModel): MethodSignature[] {
  return [...model.methods.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Reject interfaces whose methods would collide with members the generated
 * class declares for itself.
 */
export function assertNoReservedMembers(
  spec: DecoratorSpec,
  model: InterfaceModel,
  reserved: readonly string[]
): void {
  const clashes = reserved.filter((member) => model.methods.has(member));
  if (clashes.length > 0) {
    throw new PatternConfigurationError(
      ErrorCodes.RESERVED_MEMBER,
      `Interface ${model.name} declares ${clashes.join(', ')}, which the ${spec.kind} pattern uses for its own members`,
      { interface: model.name, pattern: spec.kind, members: clashes }
    );
  }
}

/**
 * Opening line of a method: `async getUser(ctx: Context, req: GetUserRequest): Promise<...> {`.
 */
export function methodDeclaration(method: MethodSignature): string {
  const typeParameters =
    method.typeParameters.length > 0 ? `<${method.typeParameters.map((parameter) => parameter.text).join(', ')}>` : '';
  return `async ${method.name}${typeParameters}(${renderParameters(method.parameters)}): ${method.returnTypeText} {`;
}

/**
 * Call of the same method on `target`, forwarding the first `count` parameters.
 */
export function delegateCall(target: string, method: MethodSignature, count?: number): string {
  const typeArguments =
    method.typeParameters.length > 0 ? `<${method.typeParameters.map((parameter) => parameter.name).join(', ')}>` : '';
  return `${target}.${method.name}${typeArguments}(${renderArguments(method.parameters, count)})`;
}

/**
 * Prefix binding the awaited results of a call: `const [arg0, err] = `.
 */
export function bindResults(method: MethodSignature): string {
  if (method.resultStyle === 'void') {
    return '';
  }
  const names = method.results.map(resultName);
  return method.resultStyle === 'tuple' ? `const [${names.join(', ')}] = ` : `const ${names[0]} = `;
}

/**
 * Value returned when the method fails with `error`: zero values for every
 * other result, then the error.
 * @throws ZeroValueError naming the method and result without a zero value
 */
export function errorReturn(method: MethodSignature, error: string): string {
  if (method.resultStyle !== 'tuple') {
    return error;
  }
  const zeros = method.results.slice(0, -1).map((result) => zeroFor(method, result));
  return `[${[...zeros, error].join(', ')}]`;
}

/**
 * Value returned on success, with the absent literal in the error slot.
 * Undefined for void methods.
 */
export function successReturn(method: MethodSignature): string | undefined {
  if (method.resultStyle === 'void') {
    return undefined;
  }
  const values = method.results.map((result) =>
    result.isTerminalError ? (result.type.absent ?? 'null') : resultName(result)
  );
  return method.resultStyle === 'tuple' ? `[${values.join(', ')}]` : values[0];
}

/**
 * Await `call`, return its error if there is one, otherwise its results.
 */
export function callThrough(method: MethodSignature, call: string): string[] {
  const lines = [`${bindResults(method)}await ${call};`];
  if (terminalError(method)) {
    lines.push(`if (${ERROR_NAME}) {`, `  return ${errorReturn(method, ERROR_NAME)};`, '}');
  }
  const success = successReturn(method);
  if (success !== undefined) {
    lines.push(`return ${success};`);
  }
  return lines;
}

function zeroFor(method: MethodSignature, result: Result): string {
  try {
    return zeroValueOf(result.type);
  } catch (error) {
    if (error instanceof ZeroValueError) {
      throw new ZeroValueError(`Method ${method.name}, result ${result.index}: ${error.message}`, {
        ...error.details,
        method: method.name,
        result: result.index,
      });
    }
    throw error;
  }
}
