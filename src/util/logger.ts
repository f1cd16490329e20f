import * as winston from "winston";

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const logColors = {
  error: "red",
  warn: "yellow",
  info: "green",
  debug: "blue",
  trace: "magenta",
};

winston.addColors(logColors);

export type ModuleLogger = winston.Logger & {
  [level in keyof typeof logLevels]: winston.LeveledLogMethod;
};

function moduleList(value: string | undefined): string[] {
  return (value || "")
    .split(/[,\s]+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

// LOG_MODULES keeps only the listed modules ("*" or empty keeps all); LOG_HIDE_MODULES drops modules.
const moduleFilter = winston.format((info) => {
  const mod = typeof info.module === "string" ? info.module : undefined;
  if (!mod) return info;
  if (moduleList(process.env.LOG_HIDE_MODULES).includes(mod)) return false;
  const allowed = moduleList(process.env.LOG_MODULES);
  if (allowed.length > 0 && !allowed.includes("*") && !allowed.includes(mod)) return false;
  return info;
});

function formatMeta(meta: Record<string, unknown>): string {
  const entries = Object.entries(meta);
  if (entries.length === 0) return "";
  const text = entries
    .map(([key, value]) => {
      if (value instanceof Error) return `${key}=Error: ${value.message}`;
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[Unserializable]`;
      }
    })
    .join(" ");
  return ` ${text}`;
}

const lineFormat = winston.format.printf((info) => {
  const { level, message, timestamp, module: mod, stack, ...rest } = info;
  let line = `${String(timestamp)} [${level.toUpperCase()}]`;
  if (typeof mod === "string") line += ` (${mod})`;
  line += `: ${String(message)}${formatMeta(rest)}`;
  if (typeof stack === "string") line += `\n${stack}`;
  return line;
});

/**
 * One logger per module. Console output goes to stderr: stdout belongs to the
 * MCP stdio transport.
 */
export function createModuleLogger(moduleName: string): ModuleLogger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: Object.keys(logLevels),
      format: winston.format.combine(lineFormat, winston.format.colorize({ all: true, colors: logColors })),
    }),
  ];

  if (process.env.LOG_TO_FILE === "true") {
    transports.push(
      new winston.transports.File({
        filename: process.env.LOG_FILE_PATH || "logs/wled-relay.log",
        format: lineFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
        tailable: true,
      })
    );
  }

  const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    levels: logLevels,
    silent: process.env.LOG_SILENT === "true",
    format: winston.format.combine(
      winston.format((info) => {
        info.module = moduleName;
        return info;
      })(),
      moduleFilter(),
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
      winston.format.errors({ stack: true })
    ),
    transports,
    exitOnError: false,
  });
  return logger as ModuleLogger;
}

export default createModuleLogger;
