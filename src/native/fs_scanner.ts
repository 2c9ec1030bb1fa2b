import { lstat, readdir } from "node:fs/promises";
import path from "node:path";

import { rootOpenError, type DirectoryScanner, type ScanHandle, type ScanListener } from "../../web/src/app/scanner";
import { errorMessage } from "../../web/src/errors/errorProps";
import { createLogger } from "../../web/src/log";

const log = createLogger("scan");

export const FILES_PER_STEP = 1024;
export const BATCH_INTERVAL_MS = 100;

/** The parts of `node:fs/promises` the scanner reads through. */
export interface ScanFs {
  readdir(dir: string): Promise<string[]>;
  lstat(file: string): Promise<{ size: number; isFile(): boolean; isDirectory(): boolean }>;
}

const nodeFs: ScanFs = {
  readdir: (dir) => readdir(dir),
  lstat: (file) => lstat(file),
};

export interface FsDirectoryScannerOptions {
  fs?: ScanFs;
  filesPerStep?: number;
  batchIntervalMs?: number;
  now?: () => number;
}

/** Sizes of the regular files under `entry`, depth first. Links are not followed. */
async function* walkFiles(fs: ScanFs, entry: string): AsyncGenerator<number> {
  let stats: Awaited<ReturnType<ScanFs["lstat"]>>;
  try {
    stats = await fs.lstat(entry);
  } catch (err) {
    log.debug(`Skipping ${entry}: ${errorMessage(err)}`);
    return;
  }
  if (stats.isFile()) {
    yield stats.size;
    return;
  }
  if (!stats.isDirectory()) return;

  let names: string[];
  try {
    names = await fs.readdir(entry);
  } catch (err) {
    log.debug(`Skipping ${entry}: ${errorMessage(err)}`);
    return;
  }
  names.sort();
  for (const name of names) yield* walkFiles(fs, path.join(entry, name));
}

/**
 * Walks every immediate entry of the root round-robin, a fixed number of files
 * per entry at a time, so one huge subdirectory does not hold back the totals
 * of the others. Totals are published in batches at most every
 * `batchIntervalMs`.
 */
export class FsDirectoryScanner implements DirectoryScanner {
  private readonly fs: ScanFs;
  private readonly filesPerStep: number;
  private readonly batchIntervalMs: number;
  private readonly now: () => number;

  constructor(options: FsDirectoryScannerOptions = {}) {
    this.fs = options.fs ?? nodeFs;
    this.filesPerStep = Math.max(1, options.filesPerStep ?? FILES_PER_STEP);
    this.batchIntervalMs = Math.max(0, options.batchIntervalMs ?? BATCH_INTERVAL_MS);
    this.now = options.now ?? (() => performance.now());
  }

  start(root: string, listener: ScanListener): ScanHandle {
    const job = new ScanJob(this.fs, root, listener, this.filesPerStep, this.batchIntervalMs, this.now);
    void job.run().catch((err: unknown) => {
      log.error(`Scan of ${root} failed: ${errorMessage(err)}`);
      job.fail(errorMessage(err));
    });
    return { cancel: () => job.cancel() };
  }
}

class ScanJob {
  private stopped = false;
  private pending = new Map<string, number>();
  private lastFlushMs: number;

  constructor(
    private readonly fs: ScanFs,
    private readonly root: string,
    private readonly listener: ScanListener,
    private readonly filesPerStep: number,
    private readonly batchIntervalMs: number,
    private readonly now: () => number,
  ) {
    this.lastFlushMs = now();
  }

  cancel(): void {
    this.stopped = true;
  }

  fail(message: string): void {
    if (this.stopped) return;
    this.stopped = true;
    this.listener.error(message);
  }

  async run(): Promise<void> {
    let names: string[];
    try {
      names = await this.fs.readdir(this.root);
    } catch (err) {
      log.warn(`${rootOpenError(this.root)} (${errorMessage(err)})`);
      this.fail(rootOpenError(this.root));
      return;
    }
    names.sort();

    let walkers = names.map((name) => ({ name, files: walkFiles(this.fs, path.join(this.root, name)) }));
    while (walkers.length > 0) {
      const unfinished: typeof walkers = [];
      for (const walker of walkers) {
        if (this.stopped) return;
        let bytes = 0;
        let count = 0;
        let finished = false;
        while (count < this.filesPerStep) {
          const next = await walker.files.next();
          if (this.stopped) return;
          if (next.done) {
            finished = true;
            break;
          }
          bytes += next.value;
          count += 1;
        }
        if (count > 0) this.pending.set(walker.name, (this.pending.get(walker.name) ?? 0) + bytes);
        if (!finished) unfinished.push(walker);
        this.flush(false);
      }
      walkers = unfinished;
    }

    if (this.stopped) return;
    this.flush(true);
    this.stopped = true;
    this.listener.done();
  }

  private flush(force: boolean): void {
    if (this.pending.size === 0) return;
    const now = this.now();
    if (!force && now - this.lastFlushMs < this.batchIntervalMs) return;
    const batch = this.pending;
    this.pending = new Map();
    this.lastFlushMs = now;
    this.listener.batch(batch);
  }
}
