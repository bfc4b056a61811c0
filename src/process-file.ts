import { copyFileSync, writeFileSync } from 'fs';
import { ensureHead, loadDocument, serializeDocument } from './document';
import { insertBottom, insertTop } from './inject';
import { GATE_SCRIPT, SCHEDULER_SCRIPT } from './scripts';

export const DEFAULT_BACKUP_SUFFIX = '.bak';

export interface ProcessOptions {
  backupSuffix?: string;
  // Leave the file (and its backup) alone when nothing was inserted
  skipUnchanged?: boolean;
  // Compute the result but write nothing
  dryRun?: boolean;
}

export interface FileResult {
  filePath: string;
  gateInserted: boolean;
  schedulerInserted: boolean;
  // Whether the backup and the rewritten file were written
  written: boolean;
  backupPath: string;
}

/**
 * Ensures `filePath` carries the gate script at the top of <head> and the
 * scheduler script at the bottom. The original bytes are copied to
 * `filePath + backupSuffix` before the file is overwritten.
 *
 * By default the backup and rewrite happen even when both scripts were
 * already present, so markup is re-serialized on every run.
 */
export function processFile(
  filePath: string,
  {
    backupSuffix = DEFAULT_BACKUP_SUFFIX,
    skipUnchanged = false,
    dryRun = false,
  }: ProcessOptions = {}
): FileResult {
  const $ = loadDocument(filePath);
  const head = ensureHead($);
  const gateInserted = insertTop($, head, GATE_SCRIPT);
  const schedulerInserted = insertBottom($, head, SCHEDULER_SCRIPT);

  const backupPath = filePath + backupSuffix;
  const changed = gateInserted || schedulerInserted;
  const write = !dryRun && (changed || !skipUnchanged);

  if (write) {
    copyFileSync(filePath, backupPath);
    writeFileSync(filePath, serializeDocument($), 'utf8');
  }

  return {
    filePath,
    gateInserted,
    schedulerInserted,
    written: write,
    backupPath,
  };
}
