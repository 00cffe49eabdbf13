export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = (() => {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
})();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export type ModuleLogger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export function createModuleLogger(module: string): ModuleLogger {
  const write = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    process.stderr.write(`${level} [${module}] ${message}\n`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message)
  };
}
