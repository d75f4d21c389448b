/**
 * Transaction pattern.
 *
 * Every mutating call opens a transaction on the wrapped resource, builds a
 * delegate bound to it through the caller's factory, and commits or rolls
 * back depending on the outcome. Failures are returned in the error slot when
 * the method has one and thrown otherwise.
 */
import { terminalError, type InterfaceModel, type MethodSignature } from '../model/types.js';
import { ERROR_NAME } from '../naming/resolver.js';
import { ErrorCodes, PatternConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  assertNoReservedMembers,
  bindResults,
  callThrough,
  delegateCall,
  errorReturn,
  indent,
  methodDeclaration,
  sortedMethods,
  successReturn,
} from './plumbing.js';
import type { RenderContext, TransactionSpec } from './types.js';

const RESERVED_MEMBERS = ['db', 'factory', 'commitTx', 'rollbackTx', 'abortTx'];

export function renderTransaction(spec: TransactionSpec, model: InterfaceModel, _context: RenderContext): string[] {
  assertNoReservedMembers(spec, model, RESERVED_MEMBERS);

  const undeclared = spec.readOnlyMethods.filter((name) => !model.methods.has(name));
  if (undeclared.length > 0) {
    throw new PatternConfigurationError(
      ErrorCodes.UNKNOWN_METHOD,
      `Read-only method(s) not declared by ${model.name}: ${undeclared.join(', ')}`,
      { interface: model.name, methods: undeclared }
    );
  }
  if (spec.readOnlyMethods.length === 0) {
    logger.debug(`No read-only methods configured for ${model.name}; every method runs in a transaction`);
  }

  const { className, interfaceName, interfaceQualifiedName: iface } = spec;
  const transaction = `${className}Transaction`;
  const database = `${className}Database`;
  const readOnly = new Set(spec.readOnlyMethods);

  const lines = [
    '/**',
    ` * Transaction handle ${className} opens for each mutating call.`,
    ' */',
    `export interface ${transaction} {`,
    '  commit(): Promise<void>;',
    '  rollback(): Promise<void>;',
    '}',
    '',
    '/**',
    ` * Resource ${className} opens transactions on.`,
    ' */',
    `export interface ${database}<TTx extends ${transaction} = ${transaction}> {`,
    '  begin(): Promise<TTx>;',
    '}',
    '',
    '/**',
    ` * ${className} runs each mutating call to a ${interfaceName} in its own`,
    ' * transaction. `factory` builds the delegate bound to either a',
    ' * transaction or the resource itself.',
    ' */',
    `export class ${className}<TTx extends ${transaction}> implements ${iface} {`,
    '  constructor(',
    `    private readonly db: ${database}<TTx>,`,
    `    private readonly factory: (executor: TTx | ${database}<TTx>) => ${iface},`,
    '  ) {}',
  ];

  for (const method of sortedMethods(model)) {
    const body = readOnly.has(method.name) ? readOnlyBody(method) : mutatingBody(method);
    lines.push('', ...indent([methodDeclaration(method), ...indent(body), '}']));
  }

  lines.push('', ...indent(helpers()), '}');

  lines.push(
    '',
    '/**',
    ' * Run calls on the delegates `factory` builds, each mutating call in a',
    ' * transaction begun on `db`.',
    ' */',
    `export function create${className}<TTx extends ${transaction}>(`,
    `  db: ${database}<TTx>,`,
    `  factory: (executor: TTx | ${database}<TTx>) => ${iface},`,
    `): ${className}<TTx> {`,
    `  return new ${className}(db, factory);`,
    '}'
  );
  return lines;
}

function readOnlyBody(method: MethodSignature): string[] {
  return ['const repository = this.factory(this.db);', ...callThrough(method, delegateCall('repository', method))];
}

function mutatingBody(method: MethodSignature): string[] {
  const returnsError = terminalError(method) !== undefined;
  const fail = (error: string): string =>
    returnsError ? `return ${errorReturn(method, error)};` : `throw ${error};`;

  const lines = [
    'let tx: TTx;',
    'try {',
    '  tx = await this.db.begin();',
    '} catch (cause) {',
    `  ${fail("new Error('unable to start transaction', { cause })")}`,
    '}',
    '',
    'const repository = this.factory(tx);',
    `${bindResults(method)}await ${delegateCall('repository', method)}.catch((thrown: unknown) => this.abortTx(tx, thrown));`,
  ];

  if (returnsError) {
    lines.push(`if (${ERROR_NAME}) {`, `  return ${errorReturn(method, `await this.rollbackTx(tx, ${ERROR_NAME})`)};`, '}');
  }

  lines.push('', 'const commitErr = await this.commitTx(tx);', 'if (commitErr) {', `  ${fail('commitErr')}`, '}');

  const success = successReturn(method);
  if (success !== undefined) {
    lines.push('', `return ${success};`);
  }
  return lines;
}

function helpers(): string[] {
  return [
    'private async commitTx(tx: TTx): Promise<Error | null> {',
    '  try {',
    '    await tx.commit();',
    '    return null;',
    '  } catch (cause) {',
    '    return cause instanceof Error ? cause : new Error(String(cause));',
    '  }',
    '}',
    '',
    'private async rollbackTx(tx: TTx, cause: unknown): Promise<Error> {',
    '  const err = cause instanceof Error ? cause : new Error(String(cause));',
    '  try {',
    '    await tx.rollback();',
    '  } catch (rollbackErr) {',
    '    return new AggregateError(',
    '      [err, rollbackErr],',
    '      `failed to rollback transaction (${String(rollbackErr)}) for error: ${err.message}`,',
    '    );',
    '  }',
    '  return err;',
    '}',
    '',
    'private async abortTx(tx: TTx, cause: unknown): Promise<never> {',
    '  throw await this.rollbackTx(tx, cause);',
    '}',
  ];
}
