import winston from "winston";

const { combine, timestamp, errors, splat, printf, colorize } = winston.format;

const line = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  return `${ts} ${level}: ${stack ?? message}${extra}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: combine(
    errors({ stack: true }),
    splat(),
    timestamp(),
    colorize(),
    line,
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
