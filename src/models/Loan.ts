import type { LoanRecord } from "../schemas/document";
import { formatLocalDate, generateRecordId, normalizeCoin, readStoredNumber } from "./recordUtils";

export interface CreateLoanInput {
  coin: string;
  amount: number;
  platform: string;
  interestRate?: number;
  notes?: string;
  date?: string;
}

export interface LoanProps {
  id: string;
  coin: string;
  amount: number;
  platform: string;
  date: string;
  interestRate?: number;
  notes?: string;
}

/** Coins borrowed from a platform. */
export class Loan {
  readonly id: string;
  readonly coin: string;
  readonly amount: number;
  readonly platform: string;
  readonly date: string;
  /** Annual percentage. */
  readonly interestRate: number | undefined;
  readonly notes: string | undefined;

  constructor(props: LoanProps) {
    this.id = props.id;
    this.coin = props.coin;
    this.amount = props.amount;
    this.platform = props.platform;
    this.date = props.date;
    this.interestRate = props.interestRate;
    this.notes = props.notes;
  }

  static create(input: CreateLoanInput): Loan {
    return new Loan({
      id: generateRecordId(),
      coin: normalizeCoin(input.coin),
      amount: input.amount,
      platform: input.platform,
      date: input.date || formatLocalDate(),
      interestRate: input.interestRate,
      notes: input.notes,
    });
  }

  static fromRecord(record: LoanRecord): Loan {
    return new Loan({
      id: record.id,
      coin: record.coin,
      amount: readStoredNumber(record.amount),
      platform: record.platform,
      date: record.date,
      interestRate: record.interest_rate ?? undefined,
      notes: record.notes ?? undefined,
    });
  }

  toRecord(): LoanRecord {
    return {
      id: this.id,
      coin: this.coin,
      amount: this.amount,
      platform: this.platform,
      date: this.date,
      interest_rate: this.interestRate ?? null,
      notes: this.notes ?? null,
    };
  }
}

export default Loan;
