/**
 * In-memory source projects for extraction tests.
 */
import { Project } from 'ts-morph';
import { DEFAULT_COMPILER_OPTIONS, SourceProject } from '../../src/core/extract/project.js';

export const CONTEXT_SOURCE = 'export interface Context {\n  deadline?: number;\n}\n';

/**
 * A source project over `files` (absolute path → contents). Only the files
 * under `location` count as the source location; the rest are there to be
 * imported.
 */
export function inMemorySource(files: Record<string, string>, location = '/project/src/store'): SourceProject {
  const project = new Project({ useInMemoryFileSystem: true, compilerOptions: DEFAULT_COMPILER_OPTIONS });
  for (const [filePath, contents] of Object.entries(files)) {
    project.createSourceFile(filePath, contents);
  }
  const inLocation = project
    .getSourceFiles()
    .filter((file) => !file.isDeclarationFile() && file.getDirectoryPath() === location);
  return new SourceProject(project, inLocation);
}
