import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadConfig, mergeConfig } from '../../core/config/loader.js';
import { run } from '../../core/generate/generator.js';
import { parseKind } from '../../core/patterns/engine.js';
import { KIND_ALIASES } from '../../core/patterns/types.js';
import { logger as log } from '../../utils/logger.js';

interface GenerateOptions {
  interface: string;
  output: string;
  type: string;
  struct?: string;
  readOnly?: string;
  config?: string;
  tsconfig?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate a decorator class for an interface')
    .argument('<source>', 'TypeScript file, or directory of files, declaring the interface')
    .requiredOption('-i, --interface <name>', 'Interface to decorate')
    .requiredOption('-o, --output <file>', 'File to write the generated module to')
    .addOption(
      new Option('-t, --type <kind>', 'Decorator pattern').choices(Object.keys(KIND_ALIASES)).makeOptionMandatory()
    )
    .option('-s, --struct <name>', 'Name of the generated class (default: <Interface>Tracer)')
    .option('--read-only <methods>', 'Comma-separated methods run without a transaction (tx only)')
    .option('--config <path>', 'Path to wrapgen.yaml')
    .option('--tsconfig <path>', 'tsconfig.json used to resolve types')
    .option('--dry-run', 'Print the module instead of writing it')
    .option('--verbose', 'Log every generation phase')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (source: string, options: GenerateOptions) => {
      try {
        await runGenerate(source, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runGenerate(source: string, options: GenerateOptions): Promise<void> {
  if (options.verbose) {
    log.setLevel('debug');
  }

  const fileConfig = await loadConfig(process.cwd(), options.config);
  const config = options.tsconfig ? mergeConfig({ ...fileConfig, tsconfig: options.tsconfig }) : fileConfig;

  const result = await run({
    source,
    interfaceName: options.interface,
    output: options.output,
    kind: parseKind(options.type),
    className: options.struct,
    readOnlyMethods: parseMethodList(options.readOnly),
    config,
    dryRun: options.dryRun,
  });

  if (options.dryRun) {
    console.log(chalk.dim(`// ${result.outputPath}`));
    process.stdout.write(result.content);
    return;
  }

  log.success(`Wrote ${result.outputPath}`);
}

function parseMethodList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
}
