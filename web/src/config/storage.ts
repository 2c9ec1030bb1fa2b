import type { FramehostConfig } from "./framehost_config";

export const FRAMEHOST_CONFIG_STORAGE_KEY = "framehost:config:v1";

function getDefaultStorage(): Storage | undefined {
  // `localStorage` might throw in some sandboxed contexts, and does not exist under Node.
  try {
    return typeof globalThis.localStorage === "undefined" ? undefined : globalThis.localStorage;
  } catch {
    return undefined;
  }
}

export function loadStoredFramehostConfig(storage: Storage | undefined = getDefaultStorage()): unknown {
  if (!storage) return null;
  try {
    const raw = storage.getItem(FRAMEHOST_CONFIG_STORAGE_KEY);
    if (raw === null) return null;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return null;
  }
}

export function saveStoredFramehostConfig(
  overrides: Partial<FramehostConfig>,
  storage: Storage | undefined = getDefaultStorage(),
): boolean {
  if (!storage) return false;
  try {
    storage.setItem(FRAMEHOST_CONFIG_STORAGE_KEY, JSON.stringify(overrides));
    return true;
  } catch {
    // Quota or security failure: settings stay in memory for this session.
    return false;
  }
}
