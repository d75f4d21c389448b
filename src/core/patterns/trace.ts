import type { InterfaceModel } from '../model/types.js';
import { CONTEXT_NAME } from '../naming/resolver.js';
import {
  assertNoReservedMembers,
  callThrough,
  delegateCall,
  indent,
  methodDeclaration,
  sortedMethods,
} from './plumbing.js';
import type { RenderContext, TraceSpec } from './types.js';

const RESERVED_MEMBERS = ['next', 'prefix', 'tracer'];

/** Package providing the tracer API and the context spans travel in. */
export const TRACE_PACKAGE = '@opentelemetry/api';

/**
 * A class that opens a span around every delegated call and hands the
 * span-carrying context to the delegate.
 */
export function renderTrace(spec: TraceSpec, model: InterfaceModel, context: RenderContext): string[] {
  assertNoReservedMembers(spec, model, RESERVED_MEMBERS);
  context.imports.addNamed(TRACE_PACKAGE, 'trace');
  context.imports.addNamed(TRACE_PACKAGE, 'Tracer', { typeOnly: true });

  const { className, interfaceName, interfaceQualifiedName: iface } = spec;
  const lines = [
    '/**',
    ` * ${className} records a span around every call to a ${interfaceName}.`,
    ` * Spans are named \`<prefix>.${iface}.<method>\` and parented on the`,
    ' * context the call receives.',
    ' */',
    `export class ${className} implements ${iface} {`,
    '  constructor(',
    `    private readonly next: ${iface},`,
    '    private readonly prefix: string,',
    '    private readonly tracer: Tracer = trace.getTracer(prefix),',
    '  ) {}',
  ];

  for (const method of sortedMethods(model)) {
    const spanName = `\`\${this.prefix}.${iface}.${method.name}\``;
    lines.push(
      '',
      ...indent([
        methodDeclaration(method),
        `  const span = this.tracer.startSpan(${spanName}, {}, ${CONTEXT_NAME});`,
        `  ${CONTEXT_NAME} = trace.setSpan(${CONTEXT_NAME}, span);`,
        '  try {',
        ...indent(callThrough(method, delegateCall('this.next', method)), 2),
        '  } finally {',
        '    span.end();',
        '  }',
        '}',
      ])
    );
  }

  lines.push(
    '}',
    '',
    '/**',
    ' * Wrap `next` with tracing. The tracer defaults to the global provider\'s',
    ' * tracer named after `prefix`.',
    ' */',
    `export function create${className}(next: ${iface}, prefix: string, tracer?: Tracer): ${className} {`,
    `  return new ${className}(next, prefix, tracer);`,
    '}'
  );
  return lines;
}
