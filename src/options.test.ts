import path from 'path';
import { describe, expect, it } from 'vitest';
import { OptionsError } from './errors';
import { parseCliArgs } from './options';

const cwd = path.resolve('/srv/site');

describe('parseCliArgs', () => {
  it('defaults to the working directory', () => {
    expect(parseCliArgs([], cwd)).toEqual({
      root: cwd,
      ext: '.html',
      backupSuffix: '.bak',
      skipUnchanged: false,
      dryRun: false,
      quiet: false,
      help: false,
    });
  });

  it('resolves a relative root against cwd', () => {
    expect(parseCliArgs(['public'], cwd).root).toBe(path.join(cwd, 'public'));
  });

  it('reads value and boolean flags in any order', () => {
    const opts = parseCliArgs(
      ['--dry-run', 'out', '--ext', '.htm', '-q', '--backup-suffix', '.orig', '--skip-unchanged'],
      cwd
    );
    expect(opts).toEqual({
      root: path.join(cwd, 'out'),
      ext: '.htm',
      backupSuffix: '.orig',
      skipUnchanged: true,
      dryRun: true,
      quiet: true,
      help: false,
    });
  });

  it('recognizes help', () => {
    expect(parseCliArgs(['-h'], cwd).help).toBe(true);
    expect(parseCliArgs(['--help'], cwd).help).toBe(true);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--force'], cwd)).toThrow(
      new OptionsError('Unknown option: --force')
    );
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['--ext'], cwd)).toThrow(
      new OptionsError('Missing value for --ext')
    );
  });

  it('rejects a second root', () => {
    expect(() => parseCliArgs(['a', 'b'], cwd)).toThrow(
      new OptionsError('Unexpected argument: b')
    );
  });

  it('rejects a backup suffix that would be picked up as a page', () => {
    expect(() =>
      parseCliArgs(['--backup-suffix', '.old.html'], cwd)
    ).toThrow(OptionsError);
  });
});
