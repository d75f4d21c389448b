/**
 * Pattern engine.
 *
 * Dispatches a decorator spec to its pattern and assembles the module:
 * header, imports, then the pattern's declarations.
 */
import type { InterfaceModel } from '../model/types.js';
import { ErrorCodes, PatternConfigurationError, RenderError } from '../../utils/errors.js';
import { renderHeader } from './plumbing.js';
import { renderRpcAdapter } from './rpc-adapter.js';
import { renderSerializeAccess } from './serialize-access.js';
import { renderTrace } from './trace.js';
import { renderTransaction } from './transaction.js';
import { KIND_ALIASES, type DecoratorKind, type DecoratorSpec, type RenderContext } from './types.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Resolve a kind or one of its aliases.
 * @throws PatternConfigurationError for unknown kinds
 */
export function parseKind(value: string): DecoratorKind {
  const kind = Object.prototype.hasOwnProperty.call(KIND_ALIASES, value) ? KIND_ALIASES[value] : undefined;
  if (!kind) {
    throw new PatternConfigurationError(
      ErrorCodes.UNKNOWN_KIND,
      `Unknown decorator kind: ${value} (expected one of ${Object.keys(KIND_ALIASES).join(', ')})`,
      { kind: value }
    );
  }
  return kind;
}

/**
 * Class name used when none is given.
 */
export function defaultClassName(interfaceName: string): string {
  return `${interfaceName}Tracer`;
}

/**
 * Render the complete generated module.
 * @throws PatternConfigurationError, ZeroValueError, RenderError
 */
export function render(spec: DecoratorSpec, model: InterfaceModel, context: RenderContext): string {
  assertClassName(spec);

  const body = renderDeclarations(spec, model, context);
  const imports = context.imports.render();

  const lines = [...renderHeader(spec, context.sourceLabel), ''];
  if (imports.length > 0) {
    lines.push(...imports, '');
  }
  lines.push(...body);
  return `${lines.join('\n')}\n`;
}

function renderDeclarations(spec: DecoratorSpec, model: InterfaceModel, context: RenderContext): string[] {
  switch (spec.kind) {
    case 'serialize-access':
      return renderSerializeAccess(spec, model, context);
    case 'trace':
      return renderTrace(spec, model, context);
    case 'transaction':
      return renderTransaction(spec, model, context);
    case 'rpc-adapter':
      return renderRpcAdapter(spec, model, context);
    default: {
      const unhandled: never = spec;
      throw new RenderError(`Unhandled decorator spec: ${JSON.stringify(unhandled)}`);
    }
  }
}

function assertClassName(spec: DecoratorSpec): void {
  if (!IDENTIFIER.test(spec.className)) {
    throw new PatternConfigurationError(ErrorCodes.INVALID_NAME, `Invalid class name: ${spec.className}`, {
      className: spec.className,
    });
  }
  if (spec.className === spec.interfaceQualifiedName) {
    throw new PatternConfigurationError(
      ErrorCodes.INVALID_NAME,
      `Class name ${spec.className} clashes with the interface it implements`,
      { className: spec.className }
    );
  }
}
