import winston from "winston";
import { env } from "./env.js";

const logger = winston.createLogger({
  level: env.isDev ? "debug" : "info",
  silent: env.isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "catalog" },
  transports: [
    new winston.transports.Console({
      format: env.isDev
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.simple(),
          )
        : winston.format.json(),
    }),
  ],
});

export default logger;
