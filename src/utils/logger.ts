import pino from "pino";
import env, { isLogLevel } from "../config/env";

export const logger = pino({
  name: "coin-ledger",
  level: isLogLevel(env.logLevel) ? env.logLevel : "info",
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
