import type { CoinValue, Snapshot } from "../models";

export interface CoinChange {
  oldAmount: number;
  newAmount: number;
  oldPrice: number;
  newPrice: number;
  oldValue: number;
  newValue: number;
  valueChange: number;
}

export interface SnapshotComparison {
  older: Snapshot;
  newer: Snapshot;
  netValueChange: number;
  /** Relative to the older net value; zero unless that value was positive. */
  netValuePercent: number;
  profitLossChange: number;
  coinChanges: Record<string, CoinChange>;
}

const NO_VALUE: CoinValue = { amount: 0, price: 0, value: 0 };

export const compareSnapshots = (older: Snapshot, newer: Snapshot): SnapshotComparison => {
  const netValueChange = newer.netValue - older.netValue;
  const coins = new Set([...Object.keys(older.coinValues), ...Object.keys(newer.coinValues)]);
  const coinChanges: Record<string, CoinChange> = {};

  for (const coin of coins) {
    const before = older.coinValues[coin] ?? NO_VALUE;
    const after = newer.coinValues[coin] ?? NO_VALUE;
    coinChanges[coin] = {
      oldAmount: before.amount,
      newAmount: after.amount,
      oldPrice: before.price,
      newPrice: after.price,
      oldValue: before.value,
      newValue: after.value,
      valueChange: after.value - before.value,
    };
  }

  return {
    older,
    newer,
    netValueChange,
    netValuePercent: older.netValue > 0 ? (netValueChange / older.netValue) * 100 : 0,
    profitLossChange: newer.profitLoss - older.profitLoss,
    coinChanges,
  };
};

export default compareSnapshots;
