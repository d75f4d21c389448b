import type { InterfaceModel } from '../model/types.js';
import { ErrorCodes, PatternConfigurationError } from '../../utils/errors.js';
import {
  assertNoReservedMembers,
  callThrough,
  delegateCall,
  indent,
  methodDeclaration,
  sortedMethods,
} from './plumbing.js';
import type { RenderContext, RpcAdapterSpec } from './types.js';

const CLIENT_SUFFIX = 'Client';
const SERVER_SUFFIX = 'Server';
const RESERVED_MEMBERS = ['server'];

/**
 * Name of the server type an adapter for `clientName` delegates to:
 * `GreeterClient` → `GreeterServer`. Works on qualified names too.
 * @throws PatternConfigurationError when the name does not end in `Client`
 */
export function deriveDelegateName(clientName: string): string {
  if (!clientName.endsWith(CLIENT_SUFFIX)) {
    throw new PatternConfigurationError(
      ErrorCodes.NOT_A_CLIENT,
      `The rpc-adapter pattern needs an interface named <Name>${CLIENT_SUFFIX}, got ${clientName}`,
      { interface: clientName }
    );
  }
  return `${clientName.slice(0, -CLIENT_SUFFIX.length)}${SERVER_SUFFIX}`;
}

/**
 * A class that implements the client interface on top of a server
 * implementation, dropping the trailing call-options parameter.
 */
export function renderRpcAdapter(spec: RpcAdapterSpec, model: InterfaceModel, _context: RenderContext): string[] {
  assertNoReservedMembers(spec, model, RESERVED_MEMBERS);

  const { className, interfaceName, interfaceQualifiedName: iface, delegateQualifiedName: server } = spec;
  const lines = [
    '/**',
    ` * ${className} lets a ${deriveDelegateName(interfaceName)} be called through the`,
    ` * ${interfaceName} interface. The last parameter of every method is`,
    ' * accepted and ignored.',
    ' */',
    `export class ${className} implements ${iface} {`,
    `  constructor(private readonly server: ${server}) {}`,
  ];

  for (const method of sortedMethods(model)) {
    const forwarded = Math.max(method.parameters.length - 1, 0);
    lines.push(
      '',
      ...indent([
        methodDeclaration(method),
        ...indent(callThrough(method, delegateCall('this.server', method, forwarded))),
        '}',
      ])
    );
  }

  lines.push(
    '}',
    '',
    `export function create${className}(server: ${server}): ${className} {`,
    `  return new ${className}(server);`,
    '}'
  );
  return lines;
}
