import winston, { format } from "winston";
import path from "path";
import { LogLevel } from "../types";

const { combine, timestamp, colorize, printf } = winston.format;

const DEFAULT_LOGGER_ID = "prime-sieve";

let currentLevel: LogLevel = "info";

const enumerateErrorFormat = winston.format((info) => {
  if (info instanceof Error) {
    return Object.assign(
      {
        message: info.message,
        stack: info.stack,
      },
      info
    );
  }

  return info;
});

const file = (thisModule?: NodeJS.Module) =>
  format((info) => {
    if (!thisModule) {
      return info;
    }
    const BASE_PATH = path.resolve(".");
    const moduleName = thisModule.filename.split(BASE_PATH)[1] ?? thisModule.filename;
    return { ...info, moduleName };
  });

export function getLogger(thisModule?: NodeJS.Module): winston.Logger {
  const id = thisModule?.filename ?? DEFAULT_LOGGER_ID;
  if (!winston.loggers.has(id)) {
    createLogger(id, thisModule);
  }

  return winston.loggers.get(id);
}

/**
 * Apply the configured level to every logger, including ones created later.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  winston.loggers.loggers.forEach((moduleLogger) => {
    moduleLogger.level = level;
  });
}

function createLogger(id: string, thisModule?: NodeJS.Module) {
  winston.loggers.add(id, {
    level: currentLevel,
    format: winston.format.combine(timestamp(), enumerateErrorFormat()),
    transports: _createConsoleTransport(thisModule),
  });
}

// stdout belongs to the CLI verdict, so every level is written to stderr.
function _createConsoleTransport(thisModule?: NodeJS.Module): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({
    format: combine(
      colorize(),
      file(thisModule)(),
      printf(
        (info) =>
          `[${info.timestamp}] ${info.level}  [${info.moduleName ?? DEFAULT_LOGGER_ID}]: ${
            info.message
          } ${info.stack ? `\n${info.stack}` : ""}`
      )
    ),
    stderrLevels: Object.keys(winston.config.npm.levels),
  });
}

export const logger = getLogger();
