import path from "node:path";
import { createLogger, format, transports, type Logger } from "winston";

const env = process.env.NODE_ENV;
const isProd = env === "production";
const isTest = env === "test";
const level = process.env.LOG_LEVEL ?? (isProd ? "info" : "debug");
const logDir = process.env.LOG_DIR ?? "./logs";

const base = format.combine(
  format.timestamp(),
  format.errors({ stack: true }),
  format.splat()
);

// Pretty for dev, JSON for prod
const devFmt = format.combine(
  format.colorize({ all: true }),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length
      ? `\n${JSON.stringify(meta, null, 2)}`
      : "";
    return `${String(timestamp)} ${level} ${String(message)}${
      stack ? `\n${String(stack)}` : ""
    }${metaStr}`;
  })
);

const prodFmt = format.json();

function fileTransports(): transports.FileTransportInstance[] {
  if (isTest) return [];
  return [
    new transports.File({ filename: path.join(logDir, "app.log"), level: "info" }),
    new transports.File({ filename: path.join(logDir, "error.log"), level: "error" }),
  ];
}

export const logger: Logger = createLogger({
  level,
  silent: isTest,
  format: isProd ? format.combine(base, prodFmt) : format.combine(base, devFmt),
  transports: [new transports.Console(), ...fileTransports()],
});
