import dotenv from "dotenv";
import path from "node:path";
import type { LevelWithSilent } from "pino";

dotenv.config();

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const isLogLevel = (value: string): value is LevelWithSilent =>
  LOG_LEVELS.some((level) => level === value);

// Relative to this module, not the working directory.
export const DEFAULT_DATA_PATH = path.resolve(__dirname, "..", "..", "data", "portfolio.json");

const resolvePath = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  return trimmed ? path.resolve(process.cwd(), trimmed) : fallback;
};

/** Snapshots sit beside the portfolio document unless configured otherwise. */
export const defaultSnapshotsPath = (dataPath: string): string => path.join(path.dirname(dataPath), "snapshots.json");

const dataPath = resolvePath(process.env.COIN_LEDGER_DATA_PATH, DEFAULT_DATA_PATH);

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  logLevel: (process.env.LOG_LEVEL ?? "info").trim().toLowerCase(),
  dataPath,
  snapshotsPath: resolvePath(process.env.COIN_LEDGER_SNAPSHOTS_PATH, defaultSnapshotsPath(dataPath)),
};

export type EnvConfig = typeof env;

export default env;
