import { readdirSync, statSync, type Dirent } from 'fs';
import path from 'path';

export interface WalkOptions {
  // File name suffix to match, case-sensitive
  ext?: string;
  // Called for a subdirectory that cannot be read; the walk skips it.
  // Without it the error is thrown to the consumer.
  onError?: (dirPath: string, err: unknown) => void;
}

/**
 * Lazily yields every file under `root` whose name ends with `ext`
 * (default ".html"), in readdir order. Symlinked directories are not
 * followed; symlinked files are yielded.
 */
export function* walkFiles(
  root: string,
  { ext = '.html', onError }: WalkOptions = {}
): Generator<string> {
  // An unreadable root always throws.
  yield* walkDir(root, readdirSync(root, { withFileTypes: true }), ext, onError);
}

function* walkDir(
  dir: string,
  entries: Dirent[],
  ext: string,
  onError: WalkOptions['onError']
): Generator<string> {
  for (const entry of entries) {
    const full = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      let children: Dirent[];
      try {
        children = readdirSync(full, { withFileTypes: true });
      } catch (err) {
        if (!onError) throw err;
        onError(full, err);
        continue;
      }
      yield* walkDir(full, children, ext, onError);
    } else if (entry.name.endsWith(ext) && isFileLike(full, entry)) {
      yield full;
    }
  }
}

function isFileLike(full: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(full).isFile();
  } catch {
    // dangling link
    return false;
  }
}
