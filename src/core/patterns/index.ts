export * from './types.js';
export * from './plumbing.js';
export * from './engine.js';
export { renderSerializeAccess } from './serialize-access.js';
export { renderTrace } from './trace.js';
export { renderTransaction } from './transaction.js';
export { renderRpcAdapter, deriveDelegateName } from './rpc-adapter.js';
