import type { BehaviorSnapshot } from "../behavior/Behavior";

/**
 * Stores which behavior each actor was in. `save` is a compare-and-set on
 * the etag: `expectedEtag` is the etag last loaded or saved for the actor,
 * `null` when nothing has been stored yet.
 */
export interface BehaviorStore {
  load(actorId: string): Promise<BehaviorSnapshot | null>;

  save(
    actorId: string,
    snapshot: BehaviorSnapshot,
    expectedEtag: string | null,
  ): Promise<void>;

  clear(actorId: string): Promise<void>;
}
