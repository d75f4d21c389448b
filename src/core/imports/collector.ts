/**
 * Import collector.
 *
 * Accumulates the import declarations a generated module needs and renders
 * them in a fixed order: package imports first, then relative ones, each
 * sorted by specifier. Relative specifiers are always computed from the
 * output directory.
 */
import * as path from 'node:path';
import { Node, SyntaxKind, type Identifier } from 'ts-morph';
import type { ImportExtension } from '../config/schema.js';
import type { InterfaceModel } from '../model/types.js';
import { TypeResolutionError } from '../../utils/errors.js';
import { toPosixPath } from '../../utils/file-system.js';
import { leftmostIdentifier } from '../extract/symbols.js';
import type { ModuleImports, NamedImport } from './types.js';

const SOURCE_EXTENSION = /\.(ts|tsx|mts|cts)$/;

export class ImportCollector {
  private readonly modules = new Map<string, ModuleImports>();
  private interfaceModule: string | undefined;
  private interfaceNamespace: string | undefined;

  constructor(
    private readonly outputDir: string,
    private readonly extension: ImportExtension = '.js'
  ) {}

  /**
   * Import a name from `specifier`. Adding a name already imported as a value
   * keeps it a value import.
   */
  addNamed(specifier: string, name: string, options: { alias?: string; typeOnly?: boolean } = {}): void {
    const local = options.alias ?? name;
    const imports = this.module(specifier);
    const existing = imports.named.get(local);
    imports.named.set(local, {
      imported: name,
      typeOnly: (existing?.typeOnly ?? true) && (options.typeOnly ?? false),
    });
  }

  addNamespace(specifier: string, alias: string): void {
    this.module(specifier).namespace = alias;
  }

  addDefault(specifier: string, name: string): void {
    this.module(specifier).defaultName = name;
  }

  /**
   * Specifier of a project source file as seen from the output directory.
   */
  fromSourceFile(filePath: string): string {
    const relative = toPosixPath(path.relative(this.outputDir, filePath)).replace(SOURCE_EXTENSION, '');
    const specifier = relative.startsWith('.') ? relative : `./${relative}`;
    return `${specifier}${this.extension}`;
  }

  /**
   * Re-express a specifier written in `fromDir` for the output directory.
   * Package specifiers are returned unchanged.
   */
  rebase(specifier: string, fromDir: string): string {
    if (!specifier.startsWith('.')) {
      return specifier;
    }
    const relative = toPosixPath(path.relative(this.outputDir, path.resolve(fromDir, specifier)));
    return relative.startsWith('.') ? relative : `./${relative}`;
  }

  /**
   * Import the decorated interface and return the name the module should
   * use for it: the bare name when the output sits beside the interface,
   * otherwise qualified through a namespace import of its file.
   */
  useInterface(model: InterfaceModel): string {
    const specifier = this.fromSourceFile(model.filePath);
    this.interfaceModule = specifier;

    if (path.dirname(model.filePath) === this.outputDir) {
      this.addNamed(specifier, model.name, { typeOnly: true });
      return model.name;
    }

    const namespace = namespaceAlias(path.dirname(model.filePath));
    this.interfaceNamespace = namespace;
    this.addNamespace(specifier, namespace);
    return `${namespace}.${model.name}`;
  }

  /**
   * Refer to another type exported beside the decorated interface.
   * Must be called after {@link useInterface}.
   */
  useCompanion(name: string): string {
    if (!this.interfaceModule) {
      throw new Error('useCompanion called before useInterface');
    }
    if (this.interfaceNamespace) {
      return `${this.interfaceNamespace}.${name}`;
    }
    this.addNamed(this.interfaceModule, name, { typeOnly: true });
    return name;
  }

  /**
   * Import every type a signature refers to by name, from wherever the
   * signature's own file gets it.
   * @throws TypeResolutionError for names that cannot be imported
   */
  addTypeReferences(node: Node): void {
    const references = node.getDescendantsOfKind(SyntaxKind.TypeReference);
    const queries = node.getDescendantsOfKind(SyntaxKind.TypeQuery);

    for (const reference of references) {
      const identifier = leftmostIdentifier(reference.getTypeName());
      if (identifier) this.addReference(identifier);
    }
    for (const query of queries) {
      const identifier = leftmostIdentifier(query.getExprName());
      if (identifier) this.addReference(identifier);
    }
  }

  private addReference(identifier: Identifier): void {
    const name = identifier.getText();
    const declaration = identifier.getSymbol()?.getDeclarations()[0];
    if (!declaration) {
      throw new TypeResolutionError(`Cannot resolve type ${name}`, { type: name });
    }

    if (Node.isTypeParameterDeclaration(declaration)) {
      return;
    }

    const importDeclaration = declaration.getFirstAncestorByKind(SyntaxKind.ImportDeclaration);
    if (importDeclaration) {
      const specifier = this.rebase(
        importDeclaration.getModuleSpecifierValue(),
        importDeclaration.getSourceFile().getDirectoryPath()
      );
      if (Node.isImportSpecifier(declaration)) {
        this.addNamed(specifier, declaration.getName(), {
          alias: declaration.getAliasNode()?.getText(),
          typeOnly: true,
        });
      } else if (Node.isNamespaceImport(declaration)) {
        this.addNamespace(specifier, declaration.getName());
      } else if (Node.isImportClause(declaration)) {
        this.addDefault(specifier, name);
      }
      return;
    }

    const sourceFile = declaration.getSourceFile();
    if (sourceFile.isDeclarationFile() || sourceFile.isInNodeModules()) {
      return;
    }

    const exported =
      (Node.isInterfaceDeclaration(declaration) ||
        Node.isTypeAliasDeclaration(declaration) ||
        Node.isClassDeclaration(declaration) ||
        Node.isEnumDeclaration(declaration)) &&
      declaration.isExported();
    if (!exported) {
      throw new TypeResolutionError(
        `Type ${name} is declared in ${sourceFile.getFilePath()} but not exported`,
        { type: name, file: sourceFile.getFilePath() }
      );
    }
    this.addNamed(this.fromSourceFile(sourceFile.getFilePath()), name, { typeOnly: true });
  }

  /**
   * Import declarations, one per line.
   */
  render(): string[] {
    const specifiers = [...this.modules.keys()].sort((a, b) => {
      const relativeA = a.startsWith('.');
      const relativeB = b.startsWith('.');
      if (relativeA !== relativeB) return relativeA ? 1 : -1;
      return a < b ? -1 : a > b ? 1 : 0;
    });

    const lines: string[] = [];
    for (const specifier of specifiers) {
      const imports = this.modules.get(specifier);
      if (!imports) continue;

      if (imports.defaultName) {
        lines.push(`import type ${imports.defaultName} from '${specifier}';`);
      }
      if (imports.namespace) {
        lines.push(`import type * as ${imports.namespace} from '${specifier}';`);
      }
      if (imports.named.size > 0) {
        lines.push(renderNamed(specifier, imports.named));
      }
    }
    return lines;
  }

  private module(specifier: string): ModuleImports {
    let imports = this.modules.get(specifier);
    if (!imports) {
      imports = { named: new Map() };
      this.modules.set(specifier, imports);
    }
    return imports;
  }
}

function renderNamed(specifier: string, named: Map<string, NamedImport>): string {
  const entries = [...named.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const allTypes = entries.every(([, entry]) => entry.typeOnly);

  const parts = entries.map(([local, entry]) => {
    const binding = entry.imported === local ? local : `${entry.imported} as ${local}`;
    return !allTypes && entry.typeOnly ? `type ${binding}` : binding;
  });
  return `import ${allTypes ? 'type ' : ''}{ ${parts.join(', ')} } from '${specifier}';`;
}

/**
 * Identifier for a namespace import of a directory: `user-store` → `userStore`.
 */
export function namespaceAlias(directory: string): string {
  const words = path.basename(directory).split(/[^A-Za-z0-9]+/).filter(Boolean);
  const alias = words
    .map((word, index) => (index === 0 ? word.charAt(0).toLowerCase() + word.slice(1) : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
  if (!alias) return 'source';
  return /^[0-9]/.test(alias) ? `_${alias}` : alias;
}
