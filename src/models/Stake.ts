import type { StakeRecord } from "../schemas/document";
import { formatLocalDate, generateRecordId, normalizeCoin, readStoredNumber } from "./recordUtils";

export interface CreateStakeInput {
  coin: string;
  amount: number;
  platform: string;
  apy?: number;
  notes?: string;
  date?: string;
}

export interface StakeProps {
  id: string;
  coin: string;
  amount: number;
  platform: string;
  date: string;
  apy?: number;
  notes?: string;
}

/** Coins locked on a platform to earn yield. */
export class Stake {
  readonly id: string;
  readonly coin: string;
  readonly amount: number;
  readonly platform: string;
  readonly date: string;
  /** Annual percentage yield. */
  readonly apy: number | undefined;
  readonly notes: string | undefined;

  constructor(props: StakeProps) {
    this.id = props.id;
    this.coin = props.coin;
    this.amount = props.amount;
    this.platform = props.platform;
    this.date = props.date;
    this.apy = props.apy;
    this.notes = props.notes;
  }

  static create(input: CreateStakeInput): Stake {
    return new Stake({
      id: generateRecordId(),
      coin: normalizeCoin(input.coin),
      amount: input.amount,
      platform: input.platform,
      date: input.date || formatLocalDate(),
      apy: input.apy,
      notes: input.notes,
    });
  }

  static fromRecord(record: StakeRecord): Stake {
    return new Stake({
      id: record.id,
      coin: record.coin,
      amount: readStoredNumber(record.amount),
      platform: record.platform,
      date: record.date,
      apy: record.apy ?? undefined,
      notes: record.notes ?? undefined,
    });
  }

  toRecord(): StakeRecord {
    return {
      id: this.id,
      coin: this.coin,
      amount: this.amount,
      platform: this.platform,
      date: this.date,
      apy: this.apy ?? null,
      notes: this.notes ?? null,
    };
  }
}

export default Stake;
