import { z } from "zod";

const optionalText = z.string().nullish();

// JSON.stringify writes NaN and Infinity as null.
export const storedNumber = z.number().nullable();

export const holdingRecordSchema = z
  .object({
    id: z.string(),
    coin: z.string(),
    amount: storedNumber,
    purchase_price_usd: storedNumber,
    date: z.string(),
    platform: optionalText,
    notes: optionalText,
  })
  .passthrough();

export const loanRecordSchema = z
  .object({
    id: z.string(),
    coin: z.string(),
    amount: storedNumber,
    platform: z.string(),
    date: z.string(),
    interest_rate: z.number().nullish(),
    notes: optionalText,
  })
  .passthrough();

export const saleRecordSchema = z
  .object({
    id: z.string(),
    coin: z.string(),
    amount: storedNumber,
    sell_price_usd: storedNumber,
    date: z.string(),
    platform: optionalText,
    notes: optionalText,
  })
  .passthrough();

export const stakeRecordSchema = z
  .object({
    id: z.string(),
    coin: z.string(),
    amount: storedNumber,
    platform: z.string(),
    date: z.string(),
    apy: z.number().nullish(),
    notes: optionalText,
  })
  .passthrough();

// Collections may be missing in documents written by older versions.
export const portfolioDocumentSchema = z
  .object({
    holdings: z.array(holdingRecordSchema).optional(),
    loans: z.array(loanRecordSchema).optional(),
    sales: z.array(saleRecordSchema).optional(),
    stakes: z.array(stakeRecordSchema).optional(),
  })
  .passthrough();

export type HoldingRecord = z.infer<typeof holdingRecordSchema>;
export type LoanRecord = z.infer<typeof loanRecordSchema>;
export type SaleRecord = z.infer<typeof saleRecordSchema>;
export type StakeRecord = z.infer<typeof stakeRecordSchema>;
export type PortfolioDocument = z.infer<typeof portfolioDocumentSchema>;
