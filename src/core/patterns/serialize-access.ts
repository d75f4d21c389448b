import type { InterfaceModel } from '../model/types.js';
import {
  assertNoReservedMembers,
  callThrough,
  delegateCall,
  indent,
  methodDeclaration,
  sortedMethods,
} from './plumbing.js';
import type { RenderContext, SerializeAccessSpec } from './types.js';

const RESERVED_MEMBERS = ['next', 'mutex'];

/**
 * A class that holds a per-instance mutex around every delegated call.
 */
export function renderSerializeAccess(
  spec: SerializeAccessSpec,
  model: InterfaceModel,
  context: RenderContext
): string[] {
  assertNoReservedMembers(spec, model, RESERVED_MEMBERS);
  context.imports.addNamed('async-mutex', 'Mutex');

  const { className, interfaceName, interfaceQualifiedName: iface } = spec;
  const lines = [
    '/**',
    ` * ${className} serializes access to a ${interfaceName}: calls through it`,
    ' * run one at a time, in the order they arrive.',
    ' */',
    `export class ${className} implements ${iface} {`,
    '  private readonly mutex = new Mutex();',
    '',
    `  constructor(private readonly next: ${iface}) {}`,
  ];

  for (const method of sortedMethods(model)) {
    lines.push(
      '',
      ...indent([
        methodDeclaration(method),
        '  const release = await this.mutex.acquire();',
        '  try {',
        ...indent(callThrough(method, delegateCall('this.next', method)), 2),
        '  } finally {',
        '    release();',
        '  }',
        '}',
      ])
    );
  }

  lines.push(
    '}',
    '',
    '/**',
    ' * Wrap `next` so that no two calls to it overlap.',
    ' */',
    `export function create${className}(next: ${iface}): ${className} {`,
    `  return new ${className}(next);`,
    '}'
  );
  return lines;
}
