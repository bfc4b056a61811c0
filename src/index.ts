export { GATE_SCRIPT, SCHEDULER_SCRIPT } from './scripts';
export {
  ensureHead,
  loadDocument,
  parseDocument,
  serializeDocument,
  type HeadElement,
  type HtmlDocument,
} from './document';
export {
  findExactScript,
  insertBottom,
  insertTop,
  normalizeScriptText,
  scriptTextEqual,
} from './inject';
export { walkFiles, type WalkOptions } from './walk';
export {
  DEFAULT_BACKUP_SUFFIX,
  processFile,
  type FileResult,
  type ProcessOptions,
} from './process-file';
export { run, type Reporter, type RunOptions, type RunSummary } from './run';
export { parseCliArgs, USAGE, type CliOptions } from './options';
export { OptionsError, RootDirectoryError } from './errors';
