/**
 * Source project.
 *
 * Wraps a ts-morph Project over one source location (a file, or the
 * TypeScript files directly inside a directory) and answers the lookups the
 * extractor needs. Type resolution follows the module resolution of the
 * compiler options, so imported types are resolved the way tsc would.
 */
import * as path from 'node:path';
import {
  Node,
  Project,
  ts,
  type ClassDeclaration,
  type CompilerOptions,
  type EnumDeclaration,
  type InterfaceDeclaration,
  type SourceFile,
  type TypeAliasDeclaration,
} from 'ts-morph';
import { NotFoundError } from '../../utils/errors.js';
import { fileExists, isDirectorySync, listSourceFiles } from '../../utils/file-system.js';

/** A top-level declaration that introduces a type name. */
export type TypeDeclaration =
  | InterfaceDeclaration
  | TypeAliasDeclaration
  | ClassDeclaration
  | EnumDeclaration;

export interface SourceProjectOptions {
  /** tsconfig.json whose compiler options drive resolution */
  tsconfig?: string;
}

/** Used when no tsconfig is given. */
export const DEFAULT_COMPILER_OPTIONS: CompilerOptions = {
  strict: true,
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  skipLibCheck: true,
};

export class SourceProject {
  private readonly files: readonly SourceFile[];

  /**
   * @param project - project holding the location's files
   * @param files - the location's files; every source file of the project when omitted
   */
  constructor(
    readonly project: Project,
    files?: readonly SourceFile[]
  ) {
    const selected = files ?? project.getSourceFiles().filter((file) => !file.isDeclarationFile());
    this.files = [...selected].sort((a, b) => comparePaths(a.getFilePath(), b.getFilePath()));
  }

  /**
   * Open a source location on disk.
   * @throws NotFoundError when the location does not exist or holds no sources
   */
  static async open(location: string, options: SourceProjectOptions = {}): Promise<SourceProject> {
    const resolved = path.resolve(location);
    if (!(await fileExists(resolved))) {
      throw new NotFoundError(`Source location not found: ${resolved}`, { location: resolved });
    }

    const filePaths = isDirectorySync(resolved) ? listSourceFiles(resolved) : [resolved];
    if (filePaths.length === 0) {
      throw new NotFoundError(`No TypeScript sources in ${resolved}`, { location: resolved });
    }

    const project = options.tsconfig
      ? new Project({
          tsConfigFilePath: options.tsconfig,
          skipAddingFilesFromTsConfig: true,
          compilerOptions: { strictNullChecks: true },
        })
      : new Project({ compilerOptions: DEFAULT_COMPILER_OPTIONS });

    const files = filePaths.map((filePath) => project.addSourceFileAtPath(filePath));
    project.resolveSourceFileDependencies();
    return new SourceProject(project, files);
  }

  getSourceFiles(): readonly SourceFile[] {
    return this.files;
  }

  /**
   * Every top-level type declaration named `name`, in file order then
   * position order.
   */
  findDeclarations(name: string): TypeDeclaration[] {
    const matches: TypeDeclaration[] = [];
    for (const file of this.files) {
      for (const statement of file.getStatements()) {
        if (
          (Node.isInterfaceDeclaration(statement) ||
            Node.isTypeAliasDeclaration(statement) ||
            Node.isClassDeclaration(statement) ||
            Node.isEnumDeclaration(statement)) &&
          statement.getName() === name
        ) {
          matches.push(statement);
        }
      }
    }
    return matches;
  }
}

/** Code unit order, the same as the default sort in `listSourceFiles`. */
function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
