import winston from "winston";
import path from "path";

const LOG_DIR = path.resolve(process.cwd(), "logs");

const timestampFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message }) => {
    return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  }),
);

// Test runs set LOG_SILENT so no log files are opened under the workspace.
const silent = process.env.LOG_SILENT === "true";

const transports: winston.transport[] = silent
  ? [new winston.transports.Console({ silent: true })]
  : [
      // errors only
      new winston.transports.File({
        filename: path.join(LOG_DIR, "error.log"),
        level: "error",
        format: timestampFormat,
      }),
      // everything
      new winston.transports.File({
        filename: path.join(LOG_DIR, "combined.log"),
        format: timestampFormat,
      }),
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: "HH:mm:ss" }),
          winston.format.printf(({ timestamp, message }) => {
            return `[${timestamp}] ${message}`;
          }),
        ),
      }),
    ];

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  transports,
});

export default logger;
