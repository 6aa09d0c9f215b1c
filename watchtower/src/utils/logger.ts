import winston from "winston"

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    winston.format.printf(
      ({ timestamp, level, message, service, stack }) =>
        `${timestamp} [${service || "watchtower"}] ${level}: ${stack || message}`,
    ),
  ),
  transports: [new winston.transports.Console()],
})

export default logger
