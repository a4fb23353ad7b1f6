import type { Holding, Loan, Sale, Stake } from "../models";

export interface RecordRepository {
  initialize(): Promise<void>;
  listHoldings(): Promise<Holding[]>;
  addHolding(holding: Holding): Promise<Holding>;
  removeHolding(id: string): Promise<boolean>;
  listLoans(): Promise<Loan[]>;
  addLoan(loan: Loan): Promise<Loan>;
  removeLoan(id: string): Promise<boolean>;
  listSales(): Promise<Sale[]>;
  addSale(sale: Sale): Promise<Sale>;
  removeSale(id: string): Promise<boolean>;
  listStakes(): Promise<Stake[]>;
  addStake(stake: Stake): Promise<Stake>;
  removeStake(id: string): Promise<boolean>;
}

export default RecordRepository;
