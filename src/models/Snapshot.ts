import type { CoinValueRecord, SnapshotRecord } from "../schemas/snapshots";
import { readStoredNumber } from "./recordUtils";

export interface CoinValue {
  amount: number;
  price: number;
  value: number;
}

export interface SnapshotProps {
  id: string;
  timestamp: Date;
  holdingsValue: number;
  loansValue: number;
  netValue: number;
  totalInvested: number;
  totalSold: number;
  profitLoss: number;
  profitPercent: number;
  coinValues: Record<string, CoinValue>;
  note?: string;
}

const readCoinValue = (record: CoinValueRecord): CoinValue => ({
  amount: readStoredNumber(record.amount),
  price: readStoredNumber(record.price),
  value: readStoredNumber(record.value),
});

/**
 * Portfolio value at one moment, priced with whatever the caller supplied.
 * `coinValues` covers current holdings only; loans contribute to
 * `loansValue` but are not itemised.
 */
export class Snapshot {
  readonly id: string;
  readonly timestamp: Date;
  readonly holdingsValue: number;
  readonly loansValue: number;
  readonly netValue: number;
  readonly totalInvested: number;
  readonly totalSold: number;
  readonly profitLoss: number;
  /** Profit or loss against the invested total, in percent. Zero when nothing was invested. */
  readonly profitPercent: number;
  readonly coinValues: Record<string, CoinValue>;
  readonly note: string | undefined;

  constructor(props: SnapshotProps) {
    this.id = props.id;
    this.timestamp = props.timestamp;
    this.holdingsValue = props.holdingsValue;
    this.loansValue = props.loansValue;
    this.netValue = props.netValue;
    this.totalInvested = props.totalInvested;
    this.totalSold = props.totalSold;
    this.profitLoss = props.profitLoss;
    this.profitPercent = props.profitPercent;
    this.coinValues = props.coinValues;
    this.note = props.note;
  }

  static fromRecord(record: SnapshotRecord): Snapshot {
    const coinValues: Record<string, CoinValue> = {};
    for (const [coin, value] of Object.entries(record.coin_values)) {
      coinValues[coin] = readCoinValue(value);
    }

    return new Snapshot({
      id: record.id,
      timestamp: new Date(record.timestamp),
      holdingsValue: readStoredNumber(record.holdings_value),
      loansValue: readStoredNumber(record.loans_value),
      netValue: readStoredNumber(record.net_value),
      totalInvested: readStoredNumber(record.total_invested),
      totalSold: readStoredNumber(record.total_sold),
      profitLoss: readStoredNumber(record.profit_loss),
      profitPercent: readStoredNumber(record.profit_percent),
      coinValues,
      note: record.note ?? undefined,
    });
  }

  toRecord(): SnapshotRecord {
    return {
      id: this.id,
      timestamp: this.timestamp.toISOString(),
      holdings_value: this.holdingsValue,
      loans_value: this.loansValue,
      net_value: this.netValue,
      total_invested: this.totalInvested,
      total_sold: this.totalSold,
      profit_loss: this.profitLoss,
      profit_percent: this.profitPercent,
      coin_values: Object.fromEntries(
        Object.entries(this.coinValues).map(([coin, { amount, price, value }]) => [coin, { amount, price, value }]),
      ),
      note: this.note ?? null,
    };
  }
}

export default Snapshot;
