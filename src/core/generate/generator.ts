/**
 * Generator.
 *
 * One generation run: open the source location, extract the interface,
 * validate it, collect imports, render, and finally write. Nothing is
 * written unless every earlier step succeeded.
 */
import * as path from 'node:path';
import type { Config, ValidationSettings } from '../config/schema.js';
import { getDefaultConfig, readOnlyMethodsFor } from '../config/loader.js';
import { InterfaceExtractor, type ExtractedInterface } from '../extract/extractor.js';
import { SourceProject } from '../extract/project.js';
import { isDeclaredInPackage } from '../extract/symbols.js';
import { ImportCollector } from '../imports/collector.js';
import { defaultClassName, render } from '../patterns/engine.js';
import { deriveDelegateName } from '../patterns/rpc-adapter.js';
import { TRACE_PACKAGE } from '../patterns/trace.js';
import type { DecoratorKind, DecoratorSpec } from '../patterns/types.js';
import { ValidationPipeline } from '../validation/pipeline.js';
import { DEFAULT_PREDICATES, requireResultCount, requireTerminalError } from '../validation/predicates.js';
import {
  ErrorCodes,
  PatternConfigurationError,
  RenderError,
  WrapgenError,
  WriteError,
} from '../../utils/errors.js';
import { toPosixPath, writeFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

export interface GenerateRequest {
  /** Source file, or directory whose TypeScript files are searched */
  source: string;
  interfaceName: string;
  /** Destination file of the generated module */
  output: string;
  kind: DecoratorKind;
  /** Defaults to `<Interface>Tracer` */
  className?: string;
  /** Added to the configured read-only methods (transaction only) */
  readOnlyMethods?: readonly string[];
  config?: Config;
  dryRun?: boolean;
}

export interface GenerateResult {
  outputPath: string;
  content: string;
  written: boolean;
}

/**
 * The validation pipeline the configuration asks for.
 */
export function buildPipeline(settings: ValidationSettings): ValidationPipeline {
  let pipeline = new ValidationPipeline(DEFAULT_PREDICATES);
  if (settings.require_terminal_error) {
    pipeline = pipeline.with(requireTerminalError);
  }
  if (settings.result_count !== undefined) {
    pipeline = pipeline.with(requireResultCount(settings.result_count));
  }
  return pipeline;
}

/**
 * Produce the module for a request without writing it.
 */
export async function generate(request: GenerateRequest): Promise<GenerateResult> {
  const config = request.config ?? getDefaultConfig();
  logger.phase('open', `Opening ${request.source}`, config.tsconfig ? { tsconfig: config.tsconfig } : undefined);
  const project = await SourceProject.open(request.source, { tsconfig: config.tsconfig });
  return {
    outputPath: path.resolve(request.output),
    content: generateFromProject(project, request, config),
    written: false,
  };
}

/**
 * Produce the module and write it, replacing any previous file. A dry run
 * stops before the write.
 * @throws WriteError when the file cannot be written
 */
export async function run(request: GenerateRequest): Promise<GenerateResult> {
  const result = await generate(request);

  if (request.dryRun) {
    logger.phase('write', `Dry run; not writing ${result.outputPath}`);
    return result;
  }

  logger.phase('write', `Writing ${result.outputPath}`);
  try {
    await writeFile(result.outputPath, result.content);
  } catch (error) {
    throw new WriteError(
      `Failed to write ${result.outputPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: result.outputPath }
    );
  }
  return { ...result, written: true };
}

/**
 * Render the module for a request against an already opened project.
 */
export function generateFromProject(project: SourceProject, request: GenerateRequest, config: Config): string {
  if (request.readOnlyMethods && request.readOnlyMethods.length > 0 && request.kind !== 'transaction') {
    throw new PatternConfigurationError(
      ErrorCodes.OPTION_UNSUPPORTED,
      `Read-only methods only apply to the transaction pattern, not ${request.kind}`,
      { kind: request.kind }
    );
  }

  logger.phase('extract', `Extracting ${request.interfaceName}`);
  const extractor = new InterfaceExtractor(project, {
    contextType: config.context_type,
    errorType: config.error_type,
  });
  const extracted = extractor.extractDeclaration(request.interfaceName);

  const pipeline = buildPipeline(config.validation);
  logger.phase('validate', `Checking ${extracted.model.methods.size} method(s) against ${pipeline.size} predicate(s)`);
  pipeline.validate(extracted.model);

  const outputPath = path.resolve(request.output);
  const imports = new ImportCollector(path.dirname(outputPath), config.import_extension);
  const interfaceQualifiedName = imports.useInterface(extracted.model);
  for (const node of extracted.methodNodes) {
    imports.addTypeReferences(node);
  }

  const spec = createSpec(request, config, project, extracted, imports, interfaceQualifiedName);
  logger.phase('render', `Rendering ${spec.className} (${spec.kind})`);

  const sourceLabel = toPosixPath(path.relative(path.dirname(outputPath), extracted.model.filePath));
  try {
    return render(spec, extracted.model, { imports, sourceLabel });
  } catch (error) {
    if (error instanceof WrapgenError) {
      throw error;
    }
    throw new RenderError(
      `Failed to render ${spec.className}: ${error instanceof Error ? error.message : String(error)}`,
      { className: spec.className, kind: spec.kind }
    );
  }
}

function createSpec(
  request: GenerateRequest,
  config: Config,
  project: SourceProject,
  extracted: ExtractedInterface,
  imports: ImportCollector,
  interfaceQualifiedName: string
): DecoratorSpec {
  const base = {
    className: request.className ?? defaultClassName(request.interfaceName),
    interfaceName: request.interfaceName,
    interfaceQualifiedName,
  };

  switch (request.kind) {
    case 'serialize-access':
      return { kind: 'serialize-access', ...base };
    case 'trace':
      assertTraceContext(extracted);
      return { kind: 'trace', ...base };
    case 'transaction': {
      const readOnlyMethods = [
        ...new Set([...readOnlyMethodsFor(config, request.interfaceName), ...(request.readOnlyMethods ?? [])]),
      ];
      return { kind: 'transaction', ...base, readOnlyMethods };
    }
    case 'rpc-adapter': {
      const delegateName = deriveDelegateName(request.interfaceName);
      assertDelegateDeclared(project, extracted, delegateName);
      return { kind: 'rpc-adapter', ...base, delegateQualifiedName: imports.useCompanion(delegateName) };
    }
  }
}

/**
 * The adapter's server type must be exported from the interface's file.
 */
function assertDelegateDeclared(project: SourceProject, extracted: ExtractedInterface, delegateName: string): void {
  const file = extracted.declaration.getSourceFile();
  const declared = project
    .findDeclarations(delegateName)
    .some((declaration) => declaration.getSourceFile() === file && declaration.isExported());

  if (!declared) {
    throw new PatternConfigurationError(
      ErrorCodes.MISSING_DELEGATE,
      `${extracted.model.name} needs an exported ${delegateName} declared in ${file.getFilePath()}`,
      { interface: extracted.model.name, delegate: delegateName, file: file.getFilePath() }
    );
  }
}

/**
 * The span-carrying context is handed to the delegate in place of the one the
 * call received, so the context parameter must be the tracer API's own type.
 */
function assertTraceContext(extracted: ExtractedInterface): void {
  for (const node of extracted.methodNodes) {
    const [first] = node.getParameters();
    if (!first || isDeclaredInPackage(first.getType(), TRACE_PACKAGE)) continue;

    const typeText = first.getTypeNode()?.getText() ?? first.getType().getText(first);
    throw new PatternConfigurationError(
      ErrorCodes.CONTEXT_UNSUPPORTED,
      `The trace pattern needs the Context from ${TRACE_PACKAGE}; ` +
        `${extracted.model.name}.${node.getName()} takes ${typeText}`,
      { interface: extracted.model.name, method: node.getName(), type: typeText }
    );
  }
}
