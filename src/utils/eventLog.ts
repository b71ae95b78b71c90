import * as fs from "fs";
import * as path from "path";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

// ====== FILE LOGGING ======
// Enabled by SIMULATOR_LOG_DIR; one file per process start.
let logFile: string | null = null;

function resolveLogFile(): string | null {
  const logsDir = process.env.SIMULATOR_LOG_DIR;
  if (!logsDir) return null;
  if (!logFile) {
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
    logFile = path.join(
      logsDir,
      `simulator-${new Date().toISOString().split("T")[0]}-${Date.now()}.log`
    );
  }
  return logFile;
}

export function logEvent(event: string, level: LogLevel = "INFO"): void {
  const timestamp = new Date().toISOString();
  const message = `[${timestamp}] [${level}] ${event}`;

  const file = resolveLogFile();
  if (file) {
    fs.appendFileSync(file, `${message}\n`);
  }

  switch (level) {
    case "ERROR":
      console.error(message);
      break;
    case "WARN":
      console.warn(message);
      break;
    case "DEBUG":
      console.debug(message);
      break;
    default:
      console.log(message);
  }
}
