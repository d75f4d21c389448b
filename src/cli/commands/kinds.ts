import { Command } from 'commander';
import chalk from 'chalk';
import { DECORATOR_KINDS, KIND_ALIASES, type DecoratorKind } from '../../core/patterns/types.js';

const DESCRIPTIONS: Record<DecoratorKind, string> = {
  'serialize-access': 'Hold a per-instance mutex around every call',
  trace: 'Open an OpenTelemetry span around every call',
  transaction: 'Run every mutating call in its own transaction',
  'rpc-adapter': 'Call a <Name>Server through the <Name>Client interface',
};

/**
 * Create the kinds command.
 */
export function createKindsCommand(): Command {
  return new Command('kinds')
    .description('List the decorator patterns and the names they accept')
    .action(() => {
      for (const line of formatKinds()) {
        console.log(line);
      }
    });
}

/**
 * One line per pattern: name, accepted spellings, description.
 */
export function formatKinds(): string[] {
  return DECORATOR_KINDS.map((kind) => {
    const spellings = Object.keys(KIND_ALIASES).filter((alias) => KIND_ALIASES[alias] === kind);
    return `${chalk.bold(kind.padEnd(18))}${chalk.dim(`[${spellings.join(', ')}]`)} ${DESCRIPTIONS[kind]}`;
  });
}
