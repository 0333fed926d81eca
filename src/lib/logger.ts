import winston from "winston";
import env from "../config/env";

// Winston logger instance
const logger = winston.createLogger({
  level: env.logLevel,
  silent: process.env.NODE_ENV === "test",
  transports: [new winston.transports.Console()],
  format: winston.format.combine(
    winston.format.cli(),
    // winston.format.prettyPrint() // Uncomment for more detailed info
  ),
});

export default logger;
