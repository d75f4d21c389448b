import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createGenerateCommand } from './commands/generate.js';
import { createKindsCommand } from './commands/kinds.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Version from package.json; the CLI runs from src/cli or dist/src/cli.
 */
function readVersion(): string {
  for (const candidate of ['../../package.json', '../../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, candidate), 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch { /* try the next location */ }
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('wrapgen')
    .description('Generate decorator classes that wrap an interface with cross-cutting behaviour')
    .version(readVersion());
  [createGenerateCommand, createKindsCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
