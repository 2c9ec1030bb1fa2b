import { createLogger } from "../log";

const log = createLogger("app-storage");

export const APP_STATE_STORAGE_KEY = "framehost:app:v1";

/** App state that survives a restart. */
export interface PersistedAppState {
  path: string;
}

export interface AppStorage {
  /** `null` when nothing usable was saved. */
  load(): PersistedAppState | null;
  save(state: PersistedAppState): void;
}

export function parsePersistedAppState(value: unknown): PersistedAppState | null {
  if (typeof value !== "object" || value === null) return null;
  const path: unknown = Reflect.get(value, "path");
  if (typeof path !== "string" || path.trim() === "") return null;
  return { path };
}

function defaultStorage(): Storage | null {
  try {
    return globalThis.localStorage ?? null;
  } catch (err) {
    log.warn("localStorage is not accessible.", err);
    return null;
  }
}

export class LocalStorageAppStorage implements AppStorage {
  constructor(private readonly storage: Storage | null = defaultStorage()) {}

  load(): PersistedAppState | null {
    if (!this.storage) return null;
    try {
      const raw = this.storage.getItem(APP_STATE_STORAGE_KEY);
      return raw === null ? null : parsePersistedAppState(JSON.parse(raw));
    } catch (err) {
      log.warn("Ignoring unreadable saved state.", err);
      return null;
    }
  }

  save(state: PersistedAppState): void {
    if (!this.storage) return;
    try {
      this.storage.setItem(APP_STATE_STORAGE_KEY, JSON.stringify(state));
    } catch (err) {
      log.warn("Failed to save state.", err);
    }
  }
}

/** Keeps state for the lifetime of the process only. */
export class MemoryAppStorage implements AppStorage {
  private state: PersistedAppState | null = null;

  load(): PersistedAppState | null {
    return this.state;
  }

  save(state: PersistedAppState): void {
    this.state = { ...state };
  }
}
