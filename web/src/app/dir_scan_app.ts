import { textPayload, type ClipboardOutcome, type RequestToken } from "../clipboard/types";
import { errorMessage } from "../errors/errorProps";
import type { InputEvent } from "../input/types";
import { createLogger } from "../log";
import type { FrameContext, FrameOutput } from "../main/frame_context";
import type { FrameApp } from "../main/frame_driver";
import { sanitizeOneLine } from "../text";
import type { PersistedAppState } from "./app_storage";
import {
  formatPercent,
  formatSize,
  rankEntries,
  resultTableText,
  shareOf,
  totalSize,
  type RankedEntry,
} from "./format";
import { rootOpenError, type DirectoryScanner, type ScanHandle, type ScanListener } from "./scanner";
import { Ui, createUiMemory } from "./ui";

const log = createLogger("dir-scan");

const PATH_FIELD = "path";
const PATH_FIELD_CHARS = 40;
const NAME_COLUMN = 2;
const NAME_CHARS = 24;
const BAR_COLUMN = NAME_COLUMN + NAME_CHARS + 2;
const BAR_CHARS = 20;
const SIZE_COLUMN = BAR_COLUMN + BAR_CHARS + 1;
const TABLE_CHARS = SIZE_COLUMN + 12;

export type ScanState =
  | { readonly kind: "idle" }
  | { readonly kind: "scanning"; readonly scanId: number; readonly totals: Map<string, number> }
  | { readonly kind: "done"; readonly entries: readonly RankedEntry[] }
  | { readonly kind: "error"; readonly message: string };

type ScanMessage =
  | { scanId: number; kind: "batch"; increments: ReadonlyMap<string, number> }
  | { scanId: number; kind: "done" }
  | { scanId: number; kind: "error"; message: string };

type ClipboardPurpose = { kind: "copy"; entries: number } | { kind: "paste" };

export interface DirScanAppOptions {
  /** `null` where the host has no file system to scan. */
  scanner: DirectoryScanner | null;
  initialPath: string;
  homeDir: string | null;
  /** Native builds can quit; a browser tab is closed by the browser. */
  allowQuit: boolean;
}

function truncateName(name: string, chars: number): string {
  const cps = Array.from(name);
  return cps.length <= chars ? name : `${cps.slice(0, chars - 1).join("")}…`;
}

function isShortcut(event: InputEvent, key: string): boolean {
  return event.kind === "key-down" && event.key === key && (event.modifiers.ctrl || event.modifiers.meta);
}

/**
 * Directory-size scanner: pick a directory, watch the ten largest entries
 * under it grow while the scan runs, copy the table, paste a path.
 */
export class DirScanApp implements FrameApp {
  private readonly scanner: DirectoryScanner | null;
  private readonly homeDir: string | null;
  private readonly allowQuit: boolean;
  private readonly memory = createUiMemory(PATH_FIELD);
  private readonly pendingClipboard = new Map<RequestToken, ClipboardPurpose>();
  private pathValue: string;
  private scanState: ScanState = { kind: "idle" };
  private handle: ScanHandle | null = null;
  private nextScanId = 1;
  private inbox: ScanMessage[] = [];
  private statusLine: string | null = null;

  constructor(options: DirScanAppOptions) {
    this.scanner = options.scanner;
    this.homeDir = options.homeDir;
    this.allowQuit = options.allowQuit;
    this.pathValue = options.initialPath;
  }

  get path(): string {
    return this.pathValue;
  }

  get state(): ScanState {
    return this.scanState;
  }

  /** Clipboard feedback shown under the results. */
  get status(): string | null {
    return this.statusLine;
  }

  snapshot(): PersistedAppState {
    return { path: this.pathValue };
  }

  /** Cancels a running scan. */
  shutdown(): void {
    this.stop();
  }

  update(ctx: FrameContext, output: FrameOutput): void {
    this.applyScanMessages(output);
    this.applyNotifications(ctx);
    this.applyShortcuts(ctx, output);
    this.draw(ctx, output);
  }

  private applyScanMessages(output: FrameOutput): void {
    const messages = this.inbox;
    this.inbox = [];
    for (const message of messages) {
      const state = this.scanState;
      if (state.kind !== "scanning" || state.scanId !== message.scanId) continue;
      switch (message.kind) {
        case "batch":
          for (const [name, bytes] of message.increments) {
            state.totals.set(name, (state.totals.get(name) ?? 0) + bytes);
          }
          break;
        case "done": {
          const entries = rankEntries(state.totals);
          this.scanState = { kind: "done", entries };
          this.handle = null;
          log.info(`Scan ${message.scanId} finished with ${state.totals.size} entries.`);
          output.announce(`Scan finished: ${entries.length} entries, ${formatSize(totalSize(entries))}`);
          break;
        }
        case "error":
          this.fail(message.message, output);
          break;
      }
    }
  }

  private applyNotifications(ctx: FrameContext): void {
    for (const notification of ctx.notifications) {
      const purpose = this.pendingClipboard.get(notification.token);
      if (!purpose) continue;
      this.pendingClipboard.delete(notification.token);
      this.statusLine = this.describeClipboardOutcome(purpose, notification.outcome);
    }
  }

  private describeClipboardOutcome(purpose: ClipboardPurpose, outcome: ClipboardOutcome): string {
    switch (outcome.status) {
      case "permission-denied":
        return "Clipboard permission denied.";
      case "unavailable":
        return `Clipboard unavailable: ${outcome.message}`;
      case "ok":
        break;
    }
    if (outcome.op === "write") {
      return purpose.kind === "copy" ? `Copied ${purpose.entries} entries.` : "Copied.";
    }
    if (outcome.payload.kind === "bytes") {
      return `Clipboard holds ${outcome.payload.mimeType} data, not text.`;
    }
    const pasted = sanitizeOneLine(outcome.payload.text);
    if (pasted === "") return "Clipboard is empty.";
    this.pathValue = pasted;
    return "Pasted path.";
  }

  private applyShortcuts(ctx: FrameContext, output: FrameOutput): void {
    for (const event of ctx.events) {
      if (isShortcut(event, "KeyC")) this.copy(output);
      else if (isShortcut(event, "KeyV")) this.paste(output);
      else if (isShortcut(event, "KeyQ")) this.quit(output);
      else if (event.kind === "key-down" && !event.repeat && event.key === "Enter") this.calculate(output);
      else if (event.kind === "key-down" && event.key === "Escape") this.stop();
    }
  }

  private copy(output: FrameOutput): void {
    const entries = this.visibleEntries();
    if (entries.length === 0) {
      this.statusLine = "Nothing to copy.";
      return;
    }
    const token = output.writeClipboard(textPayload(resultTableText(entries)));
    this.pendingClipboard.set(token, { kind: "copy", entries: entries.length });
    this.statusLine = "Copying...";
  }

  private paste(output: FrameOutput): void {
    this.pendingClipboard.set(output.readClipboard(), { kind: "paste" });
    this.statusLine = "Pasting...";
  }

  private quit(output: FrameOutput): void {
    if (!this.allowQuit) return;
    this.stop();
    output.requestClose();
  }

  private calculate(output: FrameOutput): void {
    if (this.scanState.kind === "scanning") return;
    const path = this.pathValue;
    if (!this.scanner) {
      this.fail(rootOpenError(path), output);
      return;
    }

    const scanId = this.nextScanId++;
    this.scanState = { kind: "scanning", scanId, totals: new Map() };
    const listener: ScanListener = {
      batch: (increments) => this.inbox.push({ scanId, kind: "batch", increments }),
      done: () => this.inbox.push({ scanId, kind: "done" }),
      error: (message) => this.inbox.push({ scanId, kind: "error", message }),
    };
    try {
      this.handle = this.scanner.start(path, listener);
      log.info(`Scan ${scanId} started: ${path}`);
    } catch (err) {
      log.warn(`Scan ${scanId} failed to start.`, err);
      this.fail(`${rootOpenError(path)} (${errorMessage(err)})`, output);
    }
  }

  private stop(): void {
    this.handle?.cancel();
    this.handle = null;
    if (this.scanState.kind === "scanning") this.scanState = { kind: "idle" };
    this.inbox = [];
  }

  private fail(message: string, output: FrameOutput): void {
    this.handle?.cancel();
    this.handle = null;
    this.scanState = { kind: "error", message };
    output.announce(`Error: ${message}`, "assertive");
  }

  private visibleEntries(): readonly RankedEntry[] {
    switch (this.scanState.kind) {
      case "scanning":
        return rankEntries(this.scanState.totals);
      case "done":
        return this.scanState.entries;
      default:
        return [];
    }
  }

  private draw(ctx: FrameContext, output: FrameOutput): void {
    output.draw({ kind: "clear" });
    const ui = new Ui(ctx, output, this.memory);

    if (this.allowQuit) {
      ui.label("File", "weak");
      ui.space();
      if (ui.button("Quit")) this.quit(output);
      ui.newLine();
    }

    ui.heading("Dir scan");
    ui.newLine(2);

    if (ui.button("Home") && this.homeDir !== null) this.pathValue = this.homeDir;
    this.pathValue = ui.textField(PATH_FIELD, this.pathValue, PATH_FIELD_CHARS);
    if (ui.button("Stop")) this.stop();
    if (this.scanState.kind !== "scanning" && ui.button("Calculate")) this.calculate(output);
    ui.newLine(2);

    switch (this.scanState.kind) {
      case "idle":
        break;
      case "scanning":
        ui.label("Scanning in progress...");
        break;
      case "done":
        ui.label("Done");
        break;
      case "error":
        ui.label(`Error: ${this.scanState.message}`);
        break;
    }

    const entries = this.visibleEntries();
    if (entries.length > 0) {
      ui.newLine();
      this.drawTable(ui, entries);
    }

    if (this.statusLine !== null) {
      ui.newLine(2);
      ui.label(this.statusLine, "weak");
    }
    ui.finish();
  }

  private drawTable(ui: Ui, entries: readonly RankedEntry[]): void {
    const total = totalSize(entries);
    const top = ui.cursorY;
    for (const entry of entries) {
      ui.newLine();
      ui.column(NAME_COLUMN);
      ui.label(truncateName(entry.name, NAME_CHARS));
      ui.column(BAR_COLUMN);
      const share = shareOf(entry.size, total);
      ui.progressBar(share, BAR_CHARS, formatPercent(share));
      ui.column(SIZE_COLUMN);
      ui.label(formatSize(entry.size));
    }
    ui.newLine();
    ui.column(NAME_COLUMN);
    ui.label(`Total: ${formatSize(total)}`);
    ui.newLine();
    ui.frameFrom(top, TABLE_CHARS);
  }
}
