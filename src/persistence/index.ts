import env from "../config/env";
import FileRecordRepository from "./FileRecordRepository";
import FileSnapshotRepository from "./FileSnapshotRepository";
import type RecordRepository from "./RecordRepository";
import type SnapshotRepository from "./SnapshotRepository";

export const createRecordRepository = (filePath: string = env.dataPath): RecordRepository =>
  new FileRecordRepository(filePath);

export const createSnapshotRepository = (filePath: string = env.snapshotsPath): SnapshotRepository =>
  new FileSnapshotRepository(filePath);

export { FileRecordRepository } from "./FileRecordRepository";
export { FileSnapshotRepository } from "./FileSnapshotRepository";
export type { RecordRepository } from "./RecordRepository";
export type { SnapshotRepository } from "./SnapshotRepository";
export { CorruptDocumentError, StorageError } from "./errors";
