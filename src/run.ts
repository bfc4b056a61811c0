import { RootDirectoryError } from './errors';
import { processFile, type FileResult, type ProcessOptions } from './process-file';
import { walkFiles } from './walk';

export interface RunOptions extends ProcessOptions {
  root: string;
  ext?: string;
}

export interface Reporter {
  fileProcessed(result: FileResult): void;
  // `filePath` is a directory when the walk could not list it
  fileFailed(filePath: string, err: unknown): void;
}

export interface RunSummary {
  processed: number;
  failed: number;
  // Script blocks added across all files
  inserted: number;
}

/**
 * Processes every matching file under `options.root`, one at a time. A file
 * that fails is reported and skipped; only an unreadable root aborts.
 */
export function run(options: RunOptions, reporter: Reporter): RunSummary {
  const { root, ext, ...processOptions } = options;
  const summary: RunSummary = { processed: 0, failed: 0, inserted: 0 };

  const files = walkFiles(root, {
    ext,
    onError: (dirPath, err) => {
      summary.failed++;
      reporter.fileFailed(dirPath, err);
    },
  });

  for (;;) {
    let next: IteratorResult<string>;
    try {
      next = files.next();
    } catch (err) {
      // subdirectory errors go through onError, so this is the root
      throw new RootDirectoryError(root, err);
    }
    if (next.done) break;

    const filePath = next.value;
    let result: FileResult;
    try {
      result = processFile(filePath, processOptions);
    } catch (err) {
      summary.failed++;
      reporter.fileFailed(filePath, err);
      continue;
    }

    summary.processed++;
    summary.inserted +=
      Number(result.gateInserted) + Number(result.schedulerInserted);
    reporter.fileProcessed(result);
  }

  return summary;
}
