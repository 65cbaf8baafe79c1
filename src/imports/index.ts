export { loadFile, loadSource, rejectImports, type LoadOptions } from './loader.js';
export type {
  AlternativeFallbackEvent,
  ImportFailedEvent,
  ImportResolvedEvent,
  ImportStartEvent,
  ResolverObservability,
} from './observability.js';
export { readImport, resolveImports, type ResolveOptions } from './resolver.js';
export {
  localDir,
  locateImport,
  type ImportRoot,
  type LocateOptions,
} from './root.js';
