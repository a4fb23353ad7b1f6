import { promises as fs } from "node:fs";
import { Snapshot } from "../models";
import type { SnapshotRecord } from "../schemas/snapshots";
import logger from "../utils/logger";
import { CorruptDocumentError } from "./errors";
import type { SnapshotRepository } from "./SnapshotRepository";
import { ensureDirectory, hasErrorCode, parseSnapshots, removeById, serializeDocument } from "./storeUtils";

/**
 * Keeps snapshots as a JSON array in a file of their own, apart from the
 * portfolio document. A missing file reads as no snapshots and is created
 * on the first add.
 */
export class FileSnapshotRepository implements SnapshotRepository {
  constructor(private readonly filePath: string) {}

  async add(snapshot: Snapshot): Promise<Snapshot> {
    const records = await this.load();
    records.push(snapshot.toRecord());
    await this.save(records);
    logger.debug({ id: snapshot.id }, "Snapshot stored");
    return snapshot;
  }

  async list(): Promise<Snapshot[]> {
    const snapshots = (await this.load()).map((record) => Snapshot.fromRecord(record));
    return snapshots.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  async get(id: string): Promise<Snapshot | undefined> {
    const record = (await this.load()).find((entry) => entry.id === id);
    return record ? Snapshot.fromRecord(record) : undefined;
  }

  async remove(id: string): Promise<boolean> {
    const { kept, removed } = removeById(await this.load(), id);
    if (!removed) {
      return false;
    }

    await this.save(kept);
    logger.debug({ id, removed }, "Snapshot removed");
    return true;
  }

  async count(): Promise<number> {
    return (await this.load()).length;
  }

  private async load(): Promise<SnapshotRecord[]> {
    let payload: string;
    try {
      payload = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }

    try {
      return parseSnapshots(payload, this.filePath);
    } catch (error) {
      if (error instanceof CorruptDocumentError) {
        logger.error({ err: error, filePath: this.filePath }, "Snapshot file could not be parsed");
      }
      throw error;
    }
  }

  private async save(records: SnapshotRecord[]): Promise<void> {
    await ensureDirectory(this.filePath);
    await fs.writeFile(this.filePath, serializeDocument(records), { encoding: "utf-8", mode: 0o600 });
  }
}

export default FileSnapshotRepository;
