// Terminal entrypoint: `framehost [path]`. Settings come from FRAMEHOST_*
// environment variables; log lines go to FRAMEHOST_LOG_FILE since the
// terminal itself is the render surface.
import os from "node:os";
import process from "node:process";

import { DirScanApp } from "../web/src/app/dir_scan_app";
import { parseFramehostEnvOverrides, resolveFramehostConfig } from "../web/src/config/framehost_config";
import { errorMessage } from "../web/src/errors/errorProps";
import { createLogger, setLogLevel, setLogSink } from "../web/src/log";
import { FrameDriver } from "../web/src/main/frame_driver";
import { NativeHostAdapter } from "../web/src/platform/native_host";
import { CommandSpeechSynthesizer } from "./native/command_speech";
import { FileAppStorage } from "./native/file_app_storage";
import { FsDirectoryScanner } from "./native/fs_scanner";
import { DeferredLogSink, openLogFile } from "./native/log_file_sink";
import { TerminalClipboard } from "./native/terminal_clipboard";
import { TerminalWindow } from "./native/terminal_window";

const log = createLogger("native");

async function runNative(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
  const logFile = env.FRAMEHOST_LOG_FILE ? openLogFile(env.FRAMEHOST_LOG_FILE) : null;
  const deferred = new DeferredLogSink();
  setLogSink(logFile ? logFile.sink : deferred.sink);

  const config = resolveFramehostConfig({ locked: parseFramehostEnvOverrides(env) }).effective;
  setLogLevel(config.logLevel);
  const flushLogs = async (): Promise<void> => {
    setLogSink(null);
    await logFile?.close();
    for (const line of deferred.drain()) process.stderr.write(`${line}\n`);
  };

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    process.stderr.write("framehost needs an interactive terminal.\n");
    await flushLogs();
    return 1;
  }

  const storage = new FileAppStorage();
  const terminal = new TerminalWindow({ input: process.stdin, screen: process.stdout });
  const host = new NativeHostAdapter({
    window: terminal,
    clipboard: new TerminalClipboard(process.stdout),
    speech: config.speechCommand ? new CommandSpeechSynthesizer(config.speechCommand) : null,
    queueCapacity: config.queueCapacity,
    targetFps: config.targetFps,
    scaleFactorOverride: config.scaleFactor,
  });
  const app = new DirScanApp({
    scanner: new FsDirectoryScanner(),
    initialPath: argv[0] ?? storage.load()?.path ?? process.cwd(),
    homeDir: os.homedir(),
    allowQuit: true,
  });
  const driver = new FrameDriver(host, app);

  const stop = (): void => driver.stop();
  process.once("SIGTERM", stop);
  process.once("SIGHUP", stop);

  let exitCode = 0;
  try {
    await driver.run();
  } catch (err) {
    log.error(`Stopped: ${errorMessage(err)}`);
    exitCode = 1;
  } finally {
    process.off("SIGTERM", stop);
    process.off("SIGHUP", stop);
    app.shutdown();
    storage.save(app.snapshot());
    host.close();
    log.info(`Input: ${JSON.stringify({ ...host.inputDiagnostics(), terminal: terminal.decoderDiagnostics() })}`);
  }
  await flushLogs();
  return exitCode;
}

void runNative(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`${errorMessage(err)}\n`);
    process.exitCode = 1;
  });
