/**
 * Signature model.
 *
 * Pattern-agnostic description of an interface's methods. The extractor
 * builds it once per run; everything downstream only reads it.
 */

/** Underlying representation of a primitive-like type. */
export type ScalarKind = 'number' | 'bigint' | 'string' | 'boolean';

/**
 * Coarse classification of a type. Only the distinctions the generator acts
 * on are kept:
 * - `context`   the context-carrier every method takes first
 * - `error`     the error-carrier (possibly nullable)
 * - `scalar`    number, bigint, string or boolean
 * - `named`     a type alias or enum written by name
 * - `reference` a union admitting null or undefined
 * - `array`, `interface`, `void`, `other`
 */
export type TypeKind =
  | 'context'
  | 'error'
  | 'scalar'
  | 'named'
  | 'reference'
  | 'array'
  | 'interface'
  | 'void'
  | 'other';

/** Literal that stands for "no value" in a nullable type. */
export type AbsentLiteral = 'null' | 'undefined';

/**
 * Opaque reference to a resolved type.
 */
export interface TypeRef {
  /** Source text of the type */
  text: string;
  kind: TypeKind;
  /** Underlying scalar for `scalar` types and scalar-backed `named` types */
  scalar?: ScalarKind;
  /** Set when the type admits null or undefined */
  absent?: AbsentLiteral;
}

export interface Parameter {
  index: number;
  type: TypeRef;
  /** Rest parameter; `type.text` is the declared array type */
  variadic: boolean;
  optional: boolean;
}

export interface Result {
  index: number;
  type: TypeRef;
  /** Last result, error-carrier, nullable */
  isTerminalError: boolean;
}

/**
 * How a method hands back its results:
 * `tuple` (`Promise<[A, B]>`), `single` (`Promise<A>`) or `void`.
 */
export type ResultStyle = 'tuple' | 'single' | 'void';

export interface TypeParameterInfo {
  name: string;
  /** Declaration as written (`T extends Entity`) */
  text: string;
}

export interface MethodSignature {
  /** Unique within the interface */
  name: string;
  parameters: Parameter[];
  results: Result[];
  resultStyle: ResultStyle;
  /** Returns a Promise */
  async: boolean;
  /** Declared return type, as written */
  returnTypeText: string;
  typeParameters: TypeParameterInfo[];
}

export interface InterfaceModel {
  name: string;
  /** Absolute path of the file declaring the interface */
  filePath: string;
  /** Keyed by method name; iteration order is declaration order */
  methods: Map<string, MethodSignature>;
}

/**
 * The terminal error result of a method, if it has one.
 */
export function terminalError(method: MethodSignature): Result | undefined {
  const last = method.results[method.results.length - 1];
  return last?.isTerminalError ? last : undefined;
}

