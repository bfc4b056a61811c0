// Bad command-line input; the CLI prints usage and exits with 2
export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptionsError';
  }
}

// The directory to scan cannot be listed at all
export class RootDirectoryError extends Error {
  readonly root: string;

  constructor(root: string, cause: unknown) {
    super(`Cannot read directory ${root}: ${errorMessage(cause)}`, { cause });
    this.name = 'RootDirectoryError';
    this.root = root;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
