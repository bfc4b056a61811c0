import path from 'path';
import { OptionsError } from './errors';
import { DEFAULT_BACKUP_SUFFIX } from './process-file';
import type { RunOptions } from './run';

export interface CliOptions extends Required<RunOptions> {
  quiet: boolean;
  help: boolean;
}

const VALUE_FLAGS = ['--ext', '--backup-suffix'] as const;
const BOOLEAN_FLAGS = [
  '--skip-unchanged',
  '--dry-run',
  '--quiet',
  '-q',
  '--help',
  '-h',
] as const;

export const USAGE = `Usage: access-gate [root] [options]

Adds the access-cookie gate and recheck scripts to every HTML file under
root (default: current directory). Each file is backed up before rewrite.

Options:
  --ext <suffix>            File suffix to process (default: .html)
  --backup-suffix <suffix>  Suffix for backup copies (default: ${DEFAULT_BACKUP_SUFFIX})
  --skip-unchanged          Do not back up or rewrite files that already have both scripts
  --dry-run                 Report what would change, write nothing
  -q, --quiet               Only print failures and the summary
  -h, --help                Show this message`;

function isValueFlag(arg: string): arg is (typeof VALUE_FLAGS)[number] {
  return (VALUE_FLAGS as readonly string[]).includes(arg);
}

function isBooleanFlag(arg: string): arg is (typeof BOOLEAN_FLAGS)[number] {
  return (BOOLEAN_FLAGS as readonly string[]).includes(arg);
}

/**
 * Parses `process.argv.slice(2)`. Relative roots resolve against `cwd`.
 */
export function parseCliArgs(argv: string[], cwd = process.cwd()): CliOptions {
  const opts: CliOptions = {
    root: cwd,
    ext: '.html',
    backupSuffix: DEFAULT_BACKUP_SUFFIX,
    skipUnchanged: false,
    dryRun: false,
    quiet: false,
    help: false,
  };
  let rootSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value === '') {
        throw new OptionsError(`Missing value for ${arg}`);
      }
      i++;
      if (arg === '--ext') opts.ext = value;
      else opts.backupSuffix = value;
      continue;
    }

    if (isBooleanFlag(arg)) {
      switch (arg) {
        case '--skip-unchanged':
          opts.skipUnchanged = true;
          break;
        case '--dry-run':
          opts.dryRun = true;
          break;
        case '--quiet':
        case '-q':
          opts.quiet = true;
          break;
        case '--help':
        case '-h':
          opts.help = true;
          break;
      }
      continue;
    }

    if (arg.startsWith('-')) {
      throw new OptionsError(`Unknown option: ${arg}`);
    }
    if (rootSeen) {
      throw new OptionsError(`Unexpected argument: ${arg}`);
    }
    opts.root = path.resolve(cwd, arg);
    rootSeen = true;
  }

  // The backup must not itself look like an input file on the next run.
  if (opts.backupSuffix.endsWith(opts.ext)) {
    throw new OptionsError(
      `--backup-suffix ${opts.backupSuffix} would make backups match --ext ${opts.ext}`
    );
  }

  return opts;
}
