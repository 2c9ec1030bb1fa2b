import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { ScanListener } from "../../web/src/app/scanner";
import { setLogSink } from "../../web/src/log";
import { FsDirectoryScanner, type ScanFs } from "./fs_scanner";

type Node = number | "link" | "unreadable" | { [name: string]: Node };

/** In-memory tree: numbers are files of that size. */
function memoryFs(tree: { [name: string]: Node }): ScanFs {
  const lookup = (p: string): Node | undefined => {
    let node: Node = tree;
    for (const part of p.split(path.sep).filter(Boolean)) {
      if (typeof node !== "object") return undefined;
      const child: Node | undefined = node[part];
      if (child === undefined) return undefined;
      node = child;
    }
    return node;
  };
  const missing = (p: string): Error => Object.assign(new Error(`ENOENT: ${p}`), { code: "ENOENT" });

  return {
    readdir: async (dir) => {
      const node = lookup(dir);
      if (node === "unreadable") throw Object.assign(new Error(`EACCES: ${dir}`), { code: "EACCES" });
      if (node === undefined || typeof node !== "object") throw missing(dir);
      return Object.keys(node);
    },
    lstat: async (file) => {
      const node = lookup(file);
      if (node === undefined) throw missing(file);
      return {
        size: typeof node === "number" ? node : 0,
        isFile: () => typeof node === "number",
        isDirectory: () => typeof node === "object" || node === "unreadable",
      };
    },
  };
}

interface Recorded {
  batches: Array<Array<[string, number]>>;
  errors: string[];
  done: number;
}

function record(): { listener: ScanListener; recorded: Recorded; finished: Promise<void> } {
  const recorded: Recorded = { batches: [], errors: [], done: 0 };
  let settle: () => void = () => {};
  const finished = new Promise<void>((resolve) => {
    settle = resolve;
  });
  const listener: ScanListener = {
    batch: (increments) => recorded.batches.push([...increments]),
    done: () => {
      recorded.done += 1;
      settle();
    },
    error: (message) => {
      recorded.errors.push(message);
      settle();
    },
  };
  return { listener, recorded, finished };
}

describe("native/fs_scanner", () => {
  beforeEach(() => {
    setLogSink(() => {});
  });

  afterEach(() => {
    setLogSink(null);
  });

  const tree = {
    r: {
      b: 5,
      a: { y: 20, x: 10 },
      c: "unreadable",
      d: "link",
      e: {},
    },
  } satisfies { [name: string]: Node };

  it("walks entries round-robin and skips what it cannot read", async () => {
    const scanner = new FsDirectoryScanner({ fs: memoryFs(tree), filesPerStep: 1, batchIntervalMs: 0 });
    const { listener, recorded, finished } = record();
    scanner.start(`${path.sep}r`, listener);
    await finished;

    expect(recorded).toEqual({
      batches: [[["a", 10]], [["b", 5]], [["a", 20]]],
      errors: [],
      done: 1,
    });
  });

  it("holds totals back until the batch interval has passed", async () => {
    const scanner = new FsDirectoryScanner({
      fs: memoryFs(tree),
      filesPerStep: 1024,
      batchIntervalMs: 100,
      now: () => 0,
    });
    const { listener, recorded, finished } = record();
    scanner.start(`${path.sep}r`, listener);
    await finished;

    expect(recorded.batches).toEqual([
      [
        ["a", 30],
        ["b", 5],
      ],
    ]);
    expect(recorded.done).toBe(1);
  });

  it("reports a root it cannot open", async () => {
    const scanner = new FsDirectoryScanner({ fs: memoryFs(tree) });
    const { listener, recorded, finished } = record();
    scanner.start(`${path.sep}missing`, listener);
    await finished;

    expect(recorded.errors).toEqual([`On open root dir: ${path.sep}missing`]);
    expect(recorded.done).toBe(0);
  });

  it("stays silent once cancelled", async () => {
    const scanner = new FsDirectoryScanner({ fs: memoryFs(tree), filesPerStep: 1, batchIntervalMs: 0 });
    const { listener, recorded } = record();
    const handle = scanner.start(`${path.sep}r`, listener);
    handle.cancel();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(recorded).toEqual({ batches: [], errors: [], done: 0 });
  });
});
