/**
 * Decorator pattern types.
 */
import type { ImportCollector } from '../imports/collector.js';

/** The decorator patterns wrapgen can emit. */
export type DecoratorKind = 'serialize-access' | 'trace' | 'transaction' | 'rpc-adapter';

export const DECORATOR_KINDS: readonly DecoratorKind[] = ['serialize-access', 'trace', 'transaction', 'rpc-adapter'];

/** Accepted spellings of each kind on the command line. */
export const KIND_ALIASES: Readonly<Record<string, DecoratorKind>> = Object.freeze({
  mutex: 'serialize-access',
  'serialize-access': 'serialize-access',
  trace: 'trace',
  tx: 'transaction',
  sqltx: 'transaction',
  transaction: 'transaction',
  'rpc-adapter': 'rpc-adapter',
  grpcadapter: 'rpc-adapter',
});

interface DecoratorSpecBase {
  /** Name of the generated class */
  className: string;
  interfaceName: string;
  /** How the generated module refers to the interface (`store.UserStore`) */
  interfaceQualifiedName: string;
}

export interface SerializeAccessSpec extends DecoratorSpecBase {
  kind: 'serialize-access';
}

export interface TraceSpec extends DecoratorSpecBase {
  kind: 'trace';
}

export interface TransactionSpec extends DecoratorSpecBase {
  kind: 'transaction';
  /** Methods that run without opening a transaction */
  readOnlyMethods: readonly string[];
}

export interface RpcAdapterSpec extends DecoratorSpecBase {
  kind: 'rpc-adapter';
  /** How the generated module refers to the delegate server type */
  delegateQualifiedName: string;
}

export type DecoratorSpec = SerializeAccessSpec | TraceSpec | TransactionSpec | RpcAdapterSpec;

export interface RenderContext {
  /** Receives the runtime imports the pattern needs */
  imports: ImportCollector;
  /** Source file named in the header, relative to the output */
  sourceLabel: string;
}
