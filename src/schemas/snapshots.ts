import { z } from "zod";
import { storedNumber } from "./document";

export const coinValueRecordSchema = z
  .object({
    amount: storedNumber,
    price: storedNumber,
    value: storedNumber,
  })
  .passthrough();

export const snapshotRecordSchema = z
  .object({
    id: z.string(),
    timestamp: z.string(),
    holdings_value: storedNumber,
    loans_value: storedNumber,
    net_value: storedNumber,
    total_invested: storedNumber,
    total_sold: storedNumber,
    profit_loss: storedNumber,
    profit_percent: storedNumber,
    coin_values: z.record(coinValueRecordSchema),
    note: z.string().nullish(),
  })
  .passthrough();

export const snapshotCollectionSchema = z.array(snapshotRecordSchema);

export type CoinValueRecord = z.infer<typeof coinValueRecordSchema>;
export type SnapshotRecord = z.infer<typeof snapshotRecordSchema>;
