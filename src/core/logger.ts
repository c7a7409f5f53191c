import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = typeof mod === "string" ? `[${mod}]` : "";
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(ts)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
  },
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp({ format: "HH:mm:ss.SSS" }),
        logFormat,
      ),
    }),
  ],
});

let fileTransportPath: string | undefined;

export const attachLogFile = (filename: string): void => {
  if (fileTransportPath === filename) {
    return;
  }
  fileTransportPath = filename;
  logger.add(
    new winston.transports.File({
      filename,
      maxsize: 10_000_000,
      maxFiles: 5,
    }),
  );
};

export const createModuleLogger = (moduleName: string): winston.Logger =>
  logger.child({ module: moduleName });
