// Browser entrypoint. The UI logic, bridges and frame driver live under
// `web/src/`; this file only wires them to the page.
import "./style.css";

import { LocalStorageAppStorage } from "../web/src/app/app_storage";
import { DirScanApp } from "../web/src/app/dir_scan_app";
import { createLiveRegions } from "../web/src/a11y/live_region_announcer";
import { parseFramehostQueryOverrides, resolveFramehostConfig } from "../web/src/config/framehost_config";
import { loadStoredFramehostConfig } from "../web/src/config/storage";
import { FramehostError } from "../web/src/errors/host_errors";
import { errorMessage } from "../web/src/errors/errorProps";
import { createLogger, setLogLevel } from "../web/src/log";
import { FrameDriver } from "../web/src/main/frame_driver";
import { BrowserHostAdapter } from "../web/src/platform/browser_host";
import { formatOneLineUtf8 } from "../web/src/text";

const MAX_UI_ERROR_MESSAGE_BYTES = 512;
const DEFAULT_PATH = "/";

declare global {
  interface Window {
    __framehostDriver?: FrameDriver;
  }
}

const log = createLogger("main");

function buildFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function showFatal(err: unknown): void {
  const el = document.getElementById("fatal");
  if (!el) return;
  el.textContent = formatOneLineUtf8(errorMessage(err), MAX_UI_ERROR_MESSAGE_BYTES);
  el.hidden = false;
}

function main(): void {
  const canvas = document.getElementById("framehost");
  if (!(canvas instanceof HTMLCanvasElement)) {
    throw new FramehostError("startup_failed", "The page has no <canvas id=\"framehost\">.");
  }

  const config = resolveFramehostConfig({
    stored: loadStoredFramehostConfig(),
    locked: parseFramehostQueryOverrides(location.search),
    buildFlags: { unstableClipboardApi: buildFlag(import.meta.env.VITE_UNSTABLE_CLIPBOARD_API) },
  });
  setLogLevel(config.effective.logLevel);
  for (const issue of config.issues) log.warn(issue.message);

  const liveRegions = createLiveRegions(document, document.body);
  // `navigator.clipboard` is missing outside secure contexts.
  const clipboard = config.effective.unstableClipboardApi ? (navigator.clipboard ?? null) : null;
  const host = new BrowserHostAdapter({
    canvas,
    window,
    clipboard,
    liveRegions,
    queueCapacity: config.effective.queueCapacity,
    scaleFactorOverride: config.effective.scaleFactor,
  });

  const storage = new LocalStorageAppStorage();
  const app = new DirScanApp({
    scanner: null,
    initialPath: storage.load()?.path ?? DEFAULT_PATH,
    homeDir: null,
    allowQuit: false,
  });
  const driver = new FrameDriver(host, app);
  window.__framehostDriver = driver;

  window.addEventListener("pagehide", () => storage.save(app.snapshot()));
  void driver
    .run()
    .catch((err: unknown) => {
      log.error(`Stopped: ${errorMessage(err)}`);
      showFatal(err);
    })
    .finally(() => {
      app.shutdown();
      storage.save(app.snapshot());
      host.close();
      liveRegions.remove();
    });
}

try {
  main();
} catch (err) {
  log.error(`Startup failed: ${errorMessage(err)}`);
  showFatal(err);
}
