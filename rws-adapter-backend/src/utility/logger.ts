import { createLogger, transports, format } from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import path from "path";
import { config } from "../config/config";

const logsDirectory = config.logging.directory;

const logger = createLogger({
  level: config.logging.level,
  format: format.combine(
    format.label({ label: "rws-adapter" }),
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.printf(({ level, message, label, timestamp }) => {
      return `${timestamp} [${label}] ${level}: ${message}`;
    })
  ),
  transports: [new transports.Console({ silent: config.logging.silent })],
});

if (config.logging.toFile) {
  logger.add(
    new DailyRotateFile({
      filename: path.join(logsDirectory, "application-%DATE%.log"),
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxSize: "20m",
      maxFiles: "7d",
    })
  );
  logger.add(
    new transports.File({
      filename: path.join(logsDirectory, "error.log"),
      level: "error",
    })
  );
}

export default logger;
