import { LOG_LEVELS, type LogLevel } from "../log";

export interface FramehostConfig {
  /** Event Queue capacity, in events. */
  queueCapacity: number;
  /** Native tick rate; the browser follows `requestAnimationFrame`. */
  targetFps: number;
  logLevel: LogLevel;
  /** `null` uses the scale factor the host reports. */
  scaleFactor: number | null;
  /**
   * Browser clipboard access. Off unless the bundle was built with
   * `VITE_UNSTABLE_CLIPBOARD_API=1`; see the README section on build flags.
   */
  unstableClipboardApi: boolean;
  /** Native speech command (`espeak`, `say`, `spd-say`); `null` disables narration. */
  speechCommand: string | null;
}

export type FramehostConfigKey = keyof FramehostConfig;

export const QUEUE_CAPACITY_MIN = 1;
export const QUEUE_CAPACITY_MAX = 65536;
export const TARGET_FPS_MIN = 1;
export const TARGET_FPS_MAX = 240;
export const SCALE_FACTOR_MIN = 0.5;
export const SCALE_FACTOR_MAX = 4;

export interface FramehostConfigIssue {
  key: FramehostConfigKey;
  message: string;
}

export interface ParsedFramehostOverrides {
  overrides: Partial<FramehostConfig>;
  issues: FramehostConfigIssue[];
}

export interface ParsedFramehostLockedOverrides extends ParsedFramehostOverrides {
  /** Keys fixed by the URL or environment; settings UIs must not change them. */
  lockedKeys: Set<FramehostConfigKey>;
}

export interface ResolvedFramehostConfig {
  defaults: FramehostConfig;
  effective: FramehostConfig;
  lockedKeys: Set<FramehostConfigKey>;
  issues: FramehostConfigIssue[];
}

export function getDefaultFramehostConfig(): FramehostConfig {
  return {
    queueCapacity: 256,
    targetFps: 60,
    logLevel: "info",
    scaleFactor: null,
    unstableClipboardApi: false,
    speechCommand: null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function hasOwn(obj: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function parseBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === "string") {
    const v = value.trim().toLowerCase();
    if (["1", "true", "yes", "y", "on"].includes(v)) return true;
    if (["0", "false", "no", "n", "off"].includes(v)) return false;
  }
  return undefined;
}

function parseNullableString(value: unknown): string | null | undefined {
  if (value === null) return null;
  if (typeof value !== "string") return undefined;
  const v = value.trim();
  if (v === "" || v.toLowerCase() === "null" || v.toLowerCase() === "none") return null;
  return v;
}

function parseLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== "string") return undefined;
  const v = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v);
}

type Clamped = { value: number; issue?: string };

function parseIntInRange(key: string, unit: string, value: unknown, min: number, max: number): Clamped | null {
  const num = toNumber(value);
  if (!Number.isFinite(num)) return null;
  const clamped = Math.min(max, Math.max(min, Math.trunc(num)));
  if (clamped !== num) {
    return { value: clamped, issue: `${key} must be an integer between ${min} and ${max}${unit} (clamped to ${clamped}).` };
  }
  return { value: clamped };
}

function parseScaleFactor(value: unknown): { value: number | null; issue?: string } | null {
  if (value === null) return { value: null };
  if (typeof value === "string" && ["", "auto", "null"].includes(value.trim().toLowerCase())) return { value: null };
  const num = toNumber(value);
  if (!Number.isFinite(num)) return null;
  const clamped = Math.min(SCALE_FACTOR_MAX, Math.max(SCALE_FACTOR_MIN, num));
  if (clamped !== num) {
    return { value: clamped, issue: `scaleFactor must be between ${SCALE_FACTOR_MIN} and ${SCALE_FACTOR_MAX} (clamped to ${clamped}).` };
  }
  return { value: clamped };
}

type FieldParser = (value: unknown) => { value: FramehostConfig[FramehostConfigKey]; issue?: string } | null;

const FIELD_PARSERS: { [K in FramehostConfigKey]: (value: unknown) => { value: FramehostConfig[K]; issue?: string } | null } = {
  queueCapacity: (v) => parseIntInRange("queueCapacity", " events", v, QUEUE_CAPACITY_MIN, QUEUE_CAPACITY_MAX),
  targetFps: (v) => parseIntInRange("targetFps", " fps", v, TARGET_FPS_MIN, TARGET_FPS_MAX),
  logLevel: (v) => {
    const level = parseLogLevel(v);
    return level === undefined ? null : { value: level };
  },
  scaleFactor: parseScaleFactor,
  unstableClipboardApi: (v) => {
    const b = parseBoolean(v);
    return b === undefined ? null : { value: b };
  },
  speechCommand: (v) => {
    const s = parseNullableString(v);
    return s === undefined ? null : { value: s };
  },
};

function applyField(
  key: FramehostConfigKey,
  raw: unknown,
  overrides: Partial<FramehostConfig>,
  issues: FramehostConfigIssue[],
): boolean {
  const parser: FieldParser = FIELD_PARSERS[key];
  const parsed = parser(raw);
  if (!parsed) {
    issues.push({ key, message: `Ignoring invalid ${key}: ${String(raw)}.` });
    return false;
  }
  Object.defineProperty(overrides, key, { value: parsed.value, enumerable: true, configurable: true, writable: true });
  if (parsed.issue) issues.push({ key, message: parsed.issue });
  return true;
}

const CONFIG_KEYS = Object.keys(FIELD_PARSERS).filter((k): k is FramehostConfigKey => hasOwn(FIELD_PARSERS, k));

/** Validates an untrusted record (stored settings, a deployment JSON file). */
export function parseFramehostConfigOverrides(input: unknown): ParsedFramehostOverrides {
  const overrides: Partial<FramehostConfig> = {};
  const issues: FramehostConfigIssue[] = [];
  if (!isRecord(input)) return { overrides, issues };

  for (const key of CONFIG_KEYS) {
    if (hasOwn(input, key)) applyField(key, input[key], overrides, issues);
  }
  return { overrides, issues };
}

const QUERY_PARAMS: ReadonlyArray<[string, FramehostConfigKey]> = [
  ["queue", "queueCapacity"],
  ["fps", "targetFps"],
  ["log", "logLevel"],
  ["scale", "scaleFactor"],
];

export function parseFramehostQueryOverrides(search: string): ParsedFramehostLockedOverrides {
  const params = new URLSearchParams(search.startsWith("?") ? search.slice(1) : search);
  return parseLocked(QUERY_PARAMS.map(([param, key]) => [key, params.get(param)]));
}

const ENV_VARS: ReadonlyArray<[string, FramehostConfigKey]> = [
  ["FRAMEHOST_QUEUE_CAPACITY", "queueCapacity"],
  ["FRAMEHOST_TARGET_FPS", "targetFps"],
  ["FRAMEHOST_LOG_LEVEL", "logLevel"],
  ["FRAMEHOST_SCALE_FACTOR", "scaleFactor"],
  ["FRAMEHOST_SPEECH_COMMAND", "speechCommand"],
];

export function parseFramehostEnvOverrides(env: Readonly<Record<string, string | undefined>>): ParsedFramehostLockedOverrides {
  return parseLocked(ENV_VARS.map(([name, key]) => [key, env[name] ?? null]));
}

function parseLocked(entries: ReadonlyArray<[FramehostConfigKey, string | null]>): ParsedFramehostLockedOverrides {
  const overrides: Partial<FramehostConfig> = {};
  const issues: FramehostConfigIssue[] = [];
  const lockedKeys = new Set<FramehostConfigKey>();
  for (const [key, raw] of entries) {
    if (raw === null) continue;
    if (applyField(key, raw, overrides, issues)) lockedKeys.add(key);
  }
  return { overrides, issues, lockedKeys };
}

/** Defaults, then stored settings, then URL or environment overrides. */
export function resolveFramehostConfig(args: {
  stored?: unknown;
  locked?: ParsedFramehostLockedOverrides;
  buildFlags?: Partial<Pick<FramehostConfig, "unstableClipboardApi">>;
}): ResolvedFramehostConfig {
  const defaults = getDefaultFramehostConfig();
  const stored = parseFramehostConfigOverrides(args.stored);
  const locked = args.locked ?? { overrides: {}, issues: [], lockedKeys: new Set<FramehostConfigKey>() };

  const effective: FramehostConfig = {
    ...defaults,
    ...stored.overrides,
    ...locked.overrides,
  };

  // Build flags are not user settings: a stored `unstableClipboardApi: true`
  // cannot enable an API the bundle was not built for.
  effective.unstableClipboardApi = args.buildFlags?.unstableClipboardApi ?? false;

  return {
    defaults,
    effective,
    lockedKeys: locked.lockedKeys,
    issues: [...stored.issues, ...locked.issues],
  };
}
