import {
  Holding,
  Loan,
  Sale,
  Snapshot,
  Stake,
  generateRecordId,
  type CoinValue,
  type CreateHoldingInput,
  type CreateLoanInput,
  type CreateSaleInput,
  type CreateStakeInput,
} from "../models";
import { normalizeCoin } from "../models/recordUtils";
import type { RecordRepository } from "../persistence/RecordRepository";
import { MissingPricesError } from "./errors";

/** Per-coin amounts keyed by upper-case symbol. Key order carries no meaning. */
export type CoinTotals = Record<string, number>;

export interface PortfolioSummary {
  totalHoldingsCount: number;
  totalLoansCount: number;
  totalInvestedUsd: number;
  holdingsByCoin: CoinTotals;
  loansByCoin: CoinTotals;
  netByCoin: CoinTotals;
}

export interface ExtendedPortfolioSummary extends PortfolioSummary {
  totalSalesCount: number;
  totalSoldUsd: number;
  salesByCoin: CoinTotals;
  currentByCoin: CoinTotals;
  totalStakesCount: number;
  stakesByCoin: CoinTotals;
  availableByCoin: CoinTotals;
}

/** USD unit prices keyed by coin symbol, in any case. */
export type CoinPrices = Record<string, number>;

export interface CreateSnapshotOptions {
  note?: string;
  timestamp?: Date;
}

interface CoinAmount {
  coin: string;
  amount: number;
}

const sumByCoin = (records: readonly CoinAmount[]): CoinTotals => {
  const totals = new Map<string, number>();
  for (const record of records) {
    totals.set(record.coin, (totals.get(record.coin) ?? 0) + record.amount);
  }
  return Object.fromEntries(totals);
};

const subtractByCoin = (minuend: CoinTotals, subtrahend: CoinTotals): CoinTotals => {
  const coins = new Set([...Object.keys(minuend), ...Object.keys(subtrahend)]);
  const result: CoinTotals = {};
  for (const coin of coins) {
    result[coin] = (minuend[coin] ?? 0) - (subtrahend[coin] ?? 0);
  }
  return result;
};

const sumValueUsd = (records: readonly { totalValueUsd: number }[]): number =>
  records.reduce((total, record) => total + record.totalValueUsd, 0);

const normalizePrices = (prices: CoinPrices): Map<string, number> =>
  new Map(Object.entries(prices).map(([coin, price]) => [normalizeCoin(coin), price]));

const findMissingPrices = (prices: Map<string, number>, ...groups: CoinTotals[]): string[] => {
  const missing = new Set<string>();
  for (const group of groups) {
    for (const coin of Object.keys(group)) {
      if (!prices.has(coin)) {
        missing.add(coin);
      }
    }
  }
  return [...missing];
};

/**
 * Application API over the record store. Holds no state of its own and
 * performs no business-rule checks: records are stored as given and the
 * aggregates are plain arithmetic over whatever is on disk.
 */
export class PortfolioService {
  constructor(private readonly repository: RecordRepository) {}

  public async addHolding(input: CreateHoldingInput): Promise<Holding> {
    return this.repository.addHolding(Holding.create(input));
  }

  public async removeHolding(id: string): Promise<boolean> {
    return this.repository.removeHolding(id);
  }

  public async listHoldings(): Promise<Holding[]> {
    return this.repository.listHoldings();
  }

  public async addLoan(input: CreateLoanInput): Promise<Loan> {
    return this.repository.addLoan(Loan.create(input));
  }

  public async removeLoan(id: string): Promise<boolean> {
    return this.repository.removeLoan(id);
  }

  public async listLoans(): Promise<Loan[]> {
    return this.repository.listLoans();
  }

  public async addSale(input: CreateSaleInput): Promise<Sale> {
    return this.repository.addSale(Sale.create(input));
  }

  public async removeSale(id: string): Promise<boolean> {
    return this.repository.removeSale(id);
  }

  public async listSales(): Promise<Sale[]> {
    return this.repository.listSales();
  }

  /** Staked amounts are not checked against what is available. */
  public async addStake(input: CreateStakeInput): Promise<Stake> {
    return this.repository.addStake(Stake.create(input));
  }

  public async removeStake(id: string): Promise<boolean> {
    return this.repository.removeStake(id);
  }

  public async listStakes(): Promise<Stake[]> {
    return this.repository.listStakes();
  }

  public async getHoldingsByCoin(): Promise<CoinTotals> {
    return sumByCoin(await this.repository.listHoldings());
  }

  public async getLoansByCoin(): Promise<CoinTotals> {
    return sumByCoin(await this.repository.listLoans());
  }

  public async getSalesByCoin(): Promise<CoinTotals> {
    return sumByCoin(await this.repository.listSales());
  }

  public async getStakesByCoin(): Promise<CoinTotals> {
    return sumByCoin(await this.repository.listStakes());
  }

  /** Holdings minus loans. Sales are not subtracted here. */
  public async getNetHoldingsByCoin(): Promise<CoinTotals> {
    const holdings = await this.getHoldingsByCoin();
    const loans = await this.getLoansByCoin();
    return subtractByCoin(holdings, loans);
  }

  /** Holdings minus sales. */
  public async getCurrentHoldingsByCoin(): Promise<CoinTotals> {
    const holdings = await this.getHoldingsByCoin();
    const sales = await this.getSalesByCoin();
    return subtractByCoin(holdings, sales);
  }

  /** Current holdings minus staked amounts. */
  public async getAvailableByCoin(): Promise<CoinTotals> {
    const current = await this.getCurrentHoldingsByCoin();
    const stakes = await this.getStakesByCoin();
    return subtractByCoin(current, stakes);
  }

  /** Cost of all holdings at their purchase price. Sales are not deducted. */
  public async getTotalInvestedUsd(): Promise<number> {
    return sumValueUsd(await this.repository.listHoldings());
  }

  public async getTotalSoldUsd(): Promise<number> {
    return sumValueUsd(await this.repository.listSales());
  }

  /**
   * Counts and per-coin figures for holdings and loans. Sales figures live in
   * {@link PortfolioService.getExtendedSummary}.
   */
  public async getSummary(): Promise<PortfolioSummary> {
    const holdings = await this.repository.listHoldings();
    const loans = await this.repository.listLoans();
    const holdingsByCoin = sumByCoin(holdings);
    const loansByCoin = sumByCoin(loans);

    return {
      totalHoldingsCount: holdings.length,
      totalLoansCount: loans.length,
      totalInvestedUsd: sumValueUsd(holdings),
      holdingsByCoin,
      loansByCoin,
      netByCoin: subtractByCoin(holdingsByCoin, loansByCoin),
    } satisfies PortfolioSummary;
  }

  public async getExtendedSummary(): Promise<ExtendedPortfolioSummary> {
    const summary = await this.getSummary();
    const sales = await this.repository.listSales();
    const stakes = await this.repository.listStakes();
    const salesByCoin = sumByCoin(sales);
    const stakesByCoin = sumByCoin(stakes);
    const currentByCoin = subtractByCoin(summary.holdingsByCoin, salesByCoin);

    return {
      ...summary,
      totalSalesCount: sales.length,
      totalSoldUsd: sumValueUsd(sales),
      salesByCoin,
      currentByCoin,
      totalStakesCount: stakes.length,
      stakesByCoin,
      availableByCoin: subtractByCoin(currentByCoin, stakesByCoin),
    } satisfies ExtendedPortfolioSummary;
  }

  /**
   * Values the portfolio at the given prices. Holdings are current holdings
   * (purchases minus sales); profit adds back what sales brought in.
   * The snapshot is returned, not stored.
   *
   * @throws MissingPricesError when a held or borrowed coin has no price.
   */
  public async createSnapshot(prices: CoinPrices, options: CreateSnapshotOptions = {}): Promise<Snapshot> {
    const holdingsByCoin = await this.getCurrentHoldingsByCoin();
    const loansByCoin = await this.getLoansByCoin();
    const totalInvested = await this.getTotalInvestedUsd();
    const totalSold = await this.getTotalSoldUsd();

    const priceByCoin = normalizePrices(prices);
    const missing = findMissingPrices(priceByCoin, holdingsByCoin, loansByCoin);
    if (missing.length) {
      throw new MissingPricesError(missing);
    }

    const priceOf = (coin: string): number => priceByCoin.get(coin) ?? 0;
    const coinValues: Record<string, CoinValue> = {};
    let holdingsValue = 0;
    for (const [coin, amount] of Object.entries(holdingsByCoin)) {
      const price = priceOf(coin);
      coinValues[coin] = { amount, price, value: amount * price };
      holdingsValue += amount * price;
    }

    let loansValue = 0;
    for (const [coin, amount] of Object.entries(loansByCoin)) {
      loansValue += amount * priceOf(coin);
    }

    const netValue = holdingsValue - loansValue;
    const profitLoss = netValue - totalInvested + totalSold;

    return new Snapshot({
      id: generateRecordId(),
      timestamp: options.timestamp ?? new Date(),
      holdingsValue,
      loansValue,
      netValue,
      totalInvested,
      totalSold,
      profitLoss,
      profitPercent: totalInvested > 0 ? (profitLoss / totalInvested) * 100 : 0,
      coinValues,
      note: options.note,
    });
  }
}

export default PortfolioService;
