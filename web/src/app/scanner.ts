export interface ScanListener {
  /** Bytes found since the previous batch, keyed by top-level entry name. */
  batch(increments: ReadonlyMap<string, number>): void;
  done(): void;
  /** The root itself could not be read. */
  error(message: string): void;
}

export interface ScanHandle {
  /** No listener calls follow a cancel. */
  cancel(): void;
}

/** Sums file sizes under each immediate entry of a root directory. */
export interface DirectoryScanner {
  start(root: string, listener: ScanListener): ScanHandle;
}

export function rootOpenError(path: string): string {
  return `On open root dir: ${path}`;
}
