// logger/index.ts

export {
  DevLogger,
  devLog,
  formatEntry,
  formatTime,
  getCallSite,
  type LogLevel,
  type LogEntry,
  type DevLoggerOptions,
} from "./DevLogger";
