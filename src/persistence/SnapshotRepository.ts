import type { Snapshot } from "../models";

export interface SnapshotRepository {
  add(snapshot: Snapshot): Promise<Snapshot>;
  /** Newest first. */
  list(): Promise<Snapshot[]>;
  get(id: string): Promise<Snapshot | undefined>;
  remove(id: string): Promise<boolean>;
  count(): Promise<number>;
}

export default SnapshotRepository;
