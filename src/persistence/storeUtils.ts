import { promises as fs } from "node:fs";
import path from "node:path";
import { portfolioDocumentSchema, type PortfolioDocument } from "../schemas/document";
import { snapshotCollectionSchema, type SnapshotRecord } from "../schemas/snapshots";
import { CorruptDocumentError } from "./errors";

export const emptyDocument = (): PortfolioDocument => ({
  holdings: [],
  loans: [],
  sales: [],
});

export const serializeDocument = (document: unknown): string => JSON.stringify(document, null, 2);

const readJson = (payload: string, filePath: string, label: string): unknown => {
  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new CorruptDocumentError(`${label} ${filePath} is not valid JSON`, filePath, { cause: error });
  }
};

export const parseDocument = (payload: string, filePath: string): PortfolioDocument => {
  const result = portfolioDocumentSchema.safeParse(readJson(payload, filePath, "Portfolio document"));
  if (!result.success) {
    throw new CorruptDocumentError(`Portfolio document ${filePath} has an unexpected shape`, filePath, {
      cause: result.error,
    });
  }

  return result.data;
};

export const parseSnapshots = (payload: string, filePath: string): SnapshotRecord[] => {
  const result = snapshotCollectionSchema.safeParse(readJson(payload, filePath, "Snapshot file"));
  if (!result.success) {
    throw new CorruptDocumentError(`Snapshot file ${filePath} has an unexpected shape`, filePath, {
      cause: result.error,
    });
  }

  return result.data;
};

export const ensureDirectory = async (filePath: string): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
};

export const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

/** Drops every entry with the given id, keeping the order of the rest. */
export const removeById = <T extends { id: string }>(
  entries: readonly T[],
  id: string,
): { kept: T[]; removed: number } => {
  const kept = entries.filter((entry) => entry.id !== id);
  return { kept, removed: entries.length - kept.length };
};
