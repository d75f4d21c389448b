export interface NamedImport {
  /** Name exported by the module */
  imported: string;
  /** Referenced only in type positions */
  typeOnly: boolean;
}

/** Everything imported from one module specifier. */
export interface ModuleImports {
  /** Keyed by local name */
  named: Map<string, NamedImport>;
  namespace?: string;
  defaultName?: string;
}
