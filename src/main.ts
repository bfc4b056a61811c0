import path from 'path';
import { OptionsError, RootDirectoryError, errorMessage } from './errors';
import { parseCliArgs, USAGE, type CliOptions } from './options';
import { run, type Reporter, type RunSummary } from './run';

// Simple ANSI color helpers (no external deps)
// green (success), yellow (warnings), red (errors); dim for secondary text.
export const ANSI = {
  reset: '\u001b[0m',
  dim: '\u001b[2m',

  green: '\u001b[32m', // success
  yellow: '\u001b[33m', // warnings
  red: '\u001b[31m', // errors
};

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

const consoleReporter = (
  opts: CliOptions,
  rel: (p: string) => string
): Reporter => ({
  fileProcessed(result) {
    if (opts.quiet) return;
    const verb = opts.dryRun
      ? 'Would process'
      : result.written
      ? 'Processed'
      : 'Skipped';
    console.log(`${verb} ${rel(result.filePath)}`);
  },
  fileFailed(filePath, err) {
    console.error(
      `${ANSI.red}Failed ${rel(filePath)}:${ANSI.reset} ${errorMessage(err)}`
    );
  },
});

function printSummary(summary: RunSummary, opts: CliOptions) {
  const color = summary.failed ? ANSI.yellow : ANSI.green;
  const mark = summary.failed ? '⚠' : '✔';
  console.log(
    `${color}${mark}${ANSI.reset} ${summary.processed} file${
      summary.processed === 1 ? '' : 's'
    } processed, ${summary.inserted} script${
      summary.inserted === 1 ? '' : 's'
    } inserted, ${summary.failed} failed${
      opts.dryRun ? ` ${ANSI.dim}(dry run, nothing written)${ANSI.reset}` : ''
    }`
  );
}

/**
 * Runs the tool for `argv` (without node and script path) and returns the
 * process exit code: 0 on success, 1 when a file or the root failed, 2 for
 * bad options.
 */
export function main(argv: string[], cwd: string): number {
  const rel = (p: string) => path.relative(cwd, p) || '.';

  let opts: CliOptions;
  try {
    opts = parseCliArgs(argv, cwd);
  } catch (err) {
    if (!(err instanceof OptionsError)) throw err;
    console.error(`${ANSI.red}${err.message}${ANSI.reset}\n`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (opts.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  let summary: RunSummary;
  try {
    summary = run(opts, consoleReporter(opts, rel));
  } catch (err) {
    if (!(err instanceof RootDirectoryError)) throw err;
    console.error(`${ANSI.red}${err.message}${ANSI.reset}`);
    return EXIT_FAILED;
  }

  printSummary(summary, opts);
  return summary.failed ? EXIT_FAILED : EXIT_OK;
}
