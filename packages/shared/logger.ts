import winston from "winston";

import serverConfig from "./config";

const logger = winston.createLogger({
  level: serverConfig.logLevel,
  silent: serverConfig.logSilent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(
      (info) =>
        `${String(info.timestamp)} ${info.level}: ${String(info.message)}`,
    ),
  ),
  transports: [
    // stdout is reserved for the launcher protocol
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
    ...(serverConfig.logFile
      ? [new winston.transports.File({ filename: serverConfig.logFile })]
      : []),
  ],
});

export default logger;
