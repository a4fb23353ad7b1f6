import env from "./config/env";
import { createRecordRepository } from "./persistence";
import PortfolioService from "./services/PortfolioService";

export interface CreatePortfolioOptions {
  /** Location of the JSON document. Defaults to the configured data path. */
  dataPath?: string;
}

export const createPortfolio = (options: CreatePortfolioOptions = {}): PortfolioService =>
  new PortfolioService(createRecordRepository(options.dataPath ?? env.dataPath));

export * from "./models";
export * from "./persistence";
export { PortfolioService } from "./services/PortfolioService";
export type {
  CoinPrices,
  CoinTotals,
  CreateSnapshotOptions,
  ExtendedPortfolioSummary,
  PortfolioSummary,
} from "./services/PortfolioService";
export { compareSnapshots } from "./services/compareSnapshots";
export type { CoinChange, SnapshotComparison } from "./services/compareSnapshots";
export { MissingPricesError } from "./services/errors";
export { env } from "./config/env";
export type { EnvConfig } from "./config/env";
