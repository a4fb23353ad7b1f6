import type { HoldingRecord } from "../schemas/document";
import { formatLocalDate, generateRecordId, normalizeCoin, readStoredNumber } from "./recordUtils";

export interface CreateHoldingInput {
  coin: string;
  amount: number;
  purchasePriceUsd: number;
  platform?: string;
  notes?: string;
  date?: string;
}

export interface HoldingProps {
  id: string;
  coin: string;
  amount: number;
  purchasePriceUsd: number;
  date: string;
  platform?: string;
  notes?: string;
}

/** A purchase of some amount of a coin at a USD unit price. */
export class Holding {
  readonly id: string;
  readonly coin: string;
  readonly amount: number;
  readonly purchasePriceUsd: number;
  readonly date: string;
  readonly platform: string | undefined;
  readonly notes: string | undefined;

  constructor(props: HoldingProps) {
    this.id = props.id;
    this.coin = props.coin;
    this.amount = props.amount;
    this.purchasePriceUsd = props.purchasePriceUsd;
    this.date = props.date;
    this.platform = props.platform;
    this.notes = props.notes;
  }

  static create(input: CreateHoldingInput): Holding {
    return new Holding({
      id: generateRecordId(),
      coin: normalizeCoin(input.coin),
      amount: input.amount,
      purchasePriceUsd: input.purchasePriceUsd,
      date: input.date || formatLocalDate(),
      platform: input.platform,
      notes: input.notes,
    });
  }

  static fromRecord(record: HoldingRecord): Holding {
    return new Holding({
      id: record.id,
      coin: record.coin,
      amount: readStoredNumber(record.amount),
      purchasePriceUsd: readStoredNumber(record.purchase_price_usd),
      date: record.date,
      platform: record.platform ?? undefined,
      notes: record.notes ?? undefined,
    });
  }

  /** Value at the purchase price. */
  get totalValueUsd(): number {
    return this.amount * this.purchasePriceUsd;
  }

  toRecord(): HoldingRecord {
    return {
      id: this.id,
      coin: this.coin,
      amount: this.amount,
      purchase_price_usd: this.purchasePriceUsd,
      date: this.date,
      platform: this.platform ?? null,
      notes: this.notes ?? null,
    };
  }
}

export default Holding;
