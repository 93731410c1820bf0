// DevLogger.ts
// Development text log - console output plus an optional append-only file, with file:line call sites
// Entries are tagged per vehicle ([veh:id]) or global ([global])

import { appendFileSync } from "node:fs";
import { getDevLogEnabled, getLogFile, getLogLevel, setConfigWarningSink } from "@/config/simulationConfig";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LogEntry {
  time: string;
  level: LogLevel;
  vehId: number | null;
  location: string;
  message: string;
}

export interface DevLoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  /** Append formatted lines to this file; null disables file output */
  file?: string | null;
  /** Echo to console (default true) */
  console?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const FILE_FLUSH_THRESHOLD = 100;

// Call site (fileName:line) extraction
export function getCallSite(stackOffset: number = 3, stack: string | undefined = new Error().stack): string {
  if (!stack) return "unknown";

  const lines = stack.split("\n");
  // 0: Error
  // 1: getCallSite
  // 2: log
  // 3: debug/info/...
  const targetLine = lines[stackOffset];
  if (!targetLine) return "unknown";

  // V8: "    at functionName (file:line:col)" or "    at file:line:col"
  const match =
    targetLine.match(/(?:at\s+)?(?:.*?\s+\()?([^()]+):(\d+):\d+\)?/) ||
    targetLine.match(/@(.+):(\d+):\d+/);

  if (match) {
    const filePath = match[1];
    const line = match[2];

    let fileName = filePath.split("/").pop() || filePath;
    // strip query suffixes added by loaders (?t=1234567890)
    fileName = fileName.replace(/\?.*$/, "");
    return `${fileName}:${line}`;
  }

  return "unknown";
}

// HH:MM:SS.mmm
export function formatTime(date: Date): string {
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

export function formatEntry(entry: LogEntry): string {
  const vehPart = entry.vehId !== null ? `[veh:${entry.vehId}]` : "[global]";
  return `[${entry.time}] [${entry.level.padEnd(5)}] ${vehPart} [${entry.location}] ${entry.message}\n`;
}

class DevLoggerImpl {
  private buffer: string[] = [];
  private enabled: boolean;
  private minLevel: LogLevel;
  private file: string | null;
  private echo = true;

  constructor() {
    this.enabled = getDevLogEnabled();
    this.minLevel = getLogLevel();
    this.file = getLogFile();
    setConfigWarningSink((message) => this.warn(message));
  }

  configure(options: DevLoggerOptions): void {
    // pending lines belong to the previous file
    this.flush();
    if (options.enabled !== undefined) this.enabled = options.enabled;
    if (options.level !== undefined) this.minLevel = options.level;
    if (options.file !== undefined) this.file = options.file;
    if (options.console !== undefined) this.echo = options.console;
  }

  private log(level: LogLevel, vehId: number | null, message: string, stackOffset: number): void {
    if (!this.enabled) return;
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

    const entry: LogEntry = {
      time: formatTime(new Date()),
      level,
      vehId,
      location: getCallSite(stackOffset),
      message,
    };

    const text = formatEntry(entry);

    if (this.echo) {
      const consoleMethod = level === "ERROR" ? console.error :
                           level === "WARN" ? console.warn : console.log;
      consoleMethod(text.trim());
    }

    if (this.file) {
      this.buffer.push(text);
      if (this.buffer.length >= FILE_FLUSH_THRESHOLD) {
        this.flush();
      }
    }
  }

  flush(): void {
    if (!this.file || this.buffer.length === 0) {
      this.buffer = [];
      return;
    }
    const lines = this.buffer.join("");
    this.buffer = [];
    appendFileSync(this.file, lines, "utf-8");
  }

  // global
  debug(message: string, stackOffset: number = 4): void {
    this.log("DEBUG", null, message, stackOffset);
  }

  info(message: string, stackOffset: number = 4): void {
    this.log("INFO", null, message, stackOffset);
  }

  warn(message: string, stackOffset: number = 4): void {
    this.log("WARN", null, message, stackOffset);
  }

  error(message: string, stackOffset: number = 4): void {
    this.log("ERROR", null, message, stackOffset);
  }

  // per vehicle
  vehDebug(vehId: number, message: string, stackOffset: number = 4): void {
    this.log("DEBUG", vehId, message, stackOffset);
  }

  vehInfo(vehId: number, message: string, stackOffset: number = 4): void {
    this.log("INFO", vehId, message, stackOffset);
  }

  vehWarn(vehId: number, message: string, stackOffset: number = 4): void {
    this.log("WARN", vehId, message, stackOffset);
  }

  vehError(vehId: number, message: string, stackOffset: number = 4): void {
    this.log("ERROR", vehId, message, stackOffset);
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  dispose(): void {
    this.flush();
  }
}

// singleton
export const DevLogger = new DevLoggerImpl();

// shorthand (skips one more frame to report the caller's location)
export const devLog = {
  debug: (msg: string) => DevLogger.debug(msg, 5),
  info: (msg: string) => DevLogger.info(msg, 5),
  warn: (msg: string) => DevLogger.warn(msg, 5),
  error: (msg: string) => DevLogger.error(msg, 5),
  veh: (vehId: number) => ({
    debug: (msg: string) => DevLogger.vehDebug(vehId, msg, 5),
    info: (msg: string) => DevLogger.vehInfo(vehId, msg, 5),
    warn: (msg: string) => DevLogger.vehWarn(vehId, msg, 5),
    error: (msg: string) => DevLogger.vehError(vehId, msg, 5),
  }),
};
