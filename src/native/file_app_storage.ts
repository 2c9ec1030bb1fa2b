import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { parsePersistedAppState, type AppStorage, type PersistedAppState } from "../../web/src/app/app_storage";
import { tryGetErrorCode } from "../../web/src/errors/errorProps";
import { createLogger } from "../../web/src/log";

const log = createLogger("app-storage");

/** `$XDG_CONFIG_HOME/framehost` (`%APPDATA%\framehost` on Windows). */
export function defaultConfigDir(
  env: Readonly<Record<string, string | undefined>> = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  if (platform === "win32") return path.join(env.APPDATA ?? path.join(home, "AppData", "Roaming"), "framehost");
  if (platform === "darwin") return path.join(home, "Library", "Application Support", "framehost");
  return path.join(env.XDG_CONFIG_HOME || path.join(home, ".config"), "framehost");
}

/** App state as a JSON file. Failures are logged; the app runs on with its defaults. */
export class FileAppStorage implements AppStorage {
  constructor(readonly file: string = path.join(defaultConfigDir(), "state.json")) {}

  load(): PersistedAppState | null {
    let raw: string;
    try {
      raw = readFileSync(this.file, "utf8");
    } catch (err) {
      if (tryGetErrorCode(err) !== "ENOENT") log.warn(`Cannot read ${this.file}.`, err);
      return null;
    }
    try {
      return parsePersistedAppState(JSON.parse(raw));
    } catch (err) {
      log.warn(`Ignoring malformed ${this.file}.`, err);
      return null;
    }
  }

  save(state: PersistedAppState): void {
    const tmp = `${this.file}.tmp`;
    try {
      mkdirSync(path.dirname(this.file), { recursive: true });
      writeFileSync(tmp, `${JSON.stringify(state, null, 2)}\n`, "utf8");
      renameSync(tmp, this.file);
    } catch (err) {
      log.warn(`Failed to save ${this.file}.`, err);
    }
  }
}
