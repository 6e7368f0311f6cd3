export type { Logger, LogLevel } from "./logger";
export {
  createLogger,
  createRunLogger,
  RunLogger,
  isLogLevel,
  formatTimestamp,
  runLogFileName,
} from "./logger";
