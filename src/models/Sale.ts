import type { SaleRecord } from "../schemas/document";
import { formatLocalDate, generateRecordId, normalizeCoin, readStoredNumber } from "./recordUtils";

export interface CreateSaleInput {
  coin: string;
  amount: number;
  sellPriceUsd: number;
  platform?: string;
  notes?: string;
  date?: string;
}

export interface SaleProps {
  id: string;
  coin: string;
  amount: number;
  sellPriceUsd: number;
  date: string;
  platform?: string;
  notes?: string;
}

/** A disposal of coins at a USD unit price. */
export class Sale {
  readonly id: string;
  readonly coin: string;
  readonly amount: number;
  readonly sellPriceUsd: number;
  readonly date: string;
  readonly platform: string | undefined;
  readonly notes: string | undefined;

  constructor(props: SaleProps) {
    this.id = props.id;
    this.coin = props.coin;
    this.amount = props.amount;
    this.sellPriceUsd = props.sellPriceUsd;
    this.date = props.date;
    this.platform = props.platform;
    this.notes = props.notes;
  }

  static create(input: CreateSaleInput): Sale {
    return new Sale({
      id: generateRecordId(),
      coin: normalizeCoin(input.coin),
      amount: input.amount,
      sellPriceUsd: input.sellPriceUsd,
      date: input.date || formatLocalDate(),
      platform: input.platform,
      notes: input.notes,
    });
  }

  static fromRecord(record: SaleRecord): Sale {
    return new Sale({
      id: record.id,
      coin: record.coin,
      amount: readStoredNumber(record.amount),
      sellPriceUsd: readStoredNumber(record.sell_price_usd),
      date: record.date,
      platform: record.platform ?? undefined,
      notes: record.notes ?? undefined,
    });
  }

  get totalValueUsd(): number {
    return this.amount * this.sellPriceUsd;
  }

  toRecord(): SaleRecord {
    return {
      id: this.id,
      coin: this.coin,
      amount: this.amount,
      sell_price_usd: this.sellPriceUsd,
      date: this.date,
      platform: this.platform ?? null,
      notes: this.notes ?? null,
    };
  }
}

export default Sale;
