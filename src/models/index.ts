export { Holding } from "./Holding";
export type { CreateHoldingInput, HoldingProps } from "./Holding";
export { Loan } from "./Loan";
export type { CreateLoanInput, LoanProps } from "./Loan";
export { Sale } from "./Sale";
export type { CreateSaleInput, SaleProps } from "./Sale";
export { Stake } from "./Stake";
export type { CreateStakeInput, StakeProps } from "./Stake";
export { Snapshot } from "./Snapshot";
export type { CoinValue, SnapshotProps } from "./Snapshot";
export { formatLocalDate, generateRecordId, RECORD_ID_LENGTH } from "./recordUtils";
