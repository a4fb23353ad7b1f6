import { randomUUID } from "crypto";

export const RECORD_ID_LENGTH = 8;

/**
 * Short record identifier: the leading hex characters of a v4 UUID.
 * Only 32 bits survive the truncation, so collisions are possible in very
 * large collections; they are not checked.
 */
export const generateRecordId = (): string => randomUUID().slice(0, RECORD_ID_LENGTH);

const pad = (value: number): string => String(value).padStart(2, "0");

/** Formats a day in the host's local calendar as YYYY-MM-DD. */
export const formatLocalDate = (date: Date = new Date()): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const normalizeCoin = (coin: string): string => coin.toUpperCase();

/** Reads back a number that JSON could not represent, such as NaN. */
export const readStoredNumber = (value: number | null): number => value ?? Number.NaN;
