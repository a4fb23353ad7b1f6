import path from "node:path";
import logger from "../utils/logger";
import { isLogLevel, type EnvConfig } from "./env";

export const collectEnvironmentWarnings = (env: EnvConfig): string[] => {
  const warnings: string[] = [];

  if (!isLogLevel(env.logLevel)) {
    warnings.push(`Unsupported LOG_LEVEL '${env.logLevel}'. Falling back to 'info'.`);
  }

  if (path.extname(env.dataPath).toLowerCase() !== ".json") {
    warnings.push(`COIN_LEDGER_DATA_PATH '${env.dataPath}' does not point at a .json file.`);
  }

  if (path.extname(env.snapshotsPath).toLowerCase() !== ".json") {
    warnings.push(`COIN_LEDGER_SNAPSHOTS_PATH '${env.snapshotsPath}' does not point at a .json file.`);
  }

  if (path.resolve(env.snapshotsPath) === path.resolve(env.dataPath)) {
    warnings.push("COIN_LEDGER_SNAPSHOTS_PATH and COIN_LEDGER_DATA_PATH name the same file.");
  }

  return warnings;
};

export const validateEnvironment = (env: EnvConfig): void => {
  const warnings = collectEnvironmentWarnings(env);

  warnings.forEach((message) => {
    logger.warn({ message }, "Environment validation warning");
  });

  if (!warnings.length) {
    logger.debug({ dataPath: env.dataPath }, "Environment validation completed successfully");
  }
};

export default validateEnvironment;
