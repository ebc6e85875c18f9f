import { CommitError } from "../../errors/index";
import { deserialize, isBehaviorSnapshot, serialize } from "../../serde/index";
import type { BehaviorSnapshot } from "../../behavior/Behavior";
import type { BehaviorStore } from "../types";

function auditEtag(actorId: string, stored: string | null, expected: string | null) {
  if (stored !== expected) {
    throw new CommitError(
      `Optimistic lock failure for ${actorId}: expected etag ${expected ?? "<none>"}, found ${stored ?? "<none>"}.`,
    );
  }
}

export class InMemoryBehaviorStore implements BehaviorStore {
  private records = new Map<string, string>(); // serialized BehaviorSnapshot

  async load(actorId: string): Promise<BehaviorSnapshot | null> {
    const data = this.records.get(actorId);
    if (data === undefined) return null;

    const snapshot = deserialize(data);
    if (!isBehaviorSnapshot(snapshot)) {
      throw new CommitError(`Stored behavior of ${actorId} is malformed.`);
    }
    return snapshot;
  }

  async save(
    actorId: string,
    snapshot: BehaviorSnapshot,
    expectedEtag: string | null,
  ): Promise<void> {
    const stored = await this.load(actorId);
    auditEtag(actorId, stored?.etag ?? null, expectedEtag);
    this.records.set(actorId, serialize(snapshot));
  }

  async clear(actorId: string): Promise<void> {
    this.records.delete(actorId);
  }

  get size(): number {
    return this.records.size;
  }

  reset(): void {
    this.records.clear();
  }
}
