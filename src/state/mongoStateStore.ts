// src/state/mongoStateStore.ts
import { StoreError } from "../errors";
import { decodeState, encodeState, type DialogueState, type EncodedState } from "../intake/dialogueState";
import type { SessionKey } from "../intake/transition";
import { DialogueSession } from "../models/DialogueSession";
import { KeyedMutex } from "./keyedMutex";
import type { StateStore } from "./stateStore";

const IDLE_TTL_MS = 30 * 24 * 60 * 60_000;

export type StoredRow = { state: unknown; version: number };

/** Row-level operations the store needs from the backing collection. */
export interface SessionRows {
  find(key: SessionKey): Promise<StoredRow | null>;
  /** Resolves false when another writer inserted the key first. */
  insert(key: SessionKey, state: EncodedState, expiresAt: Date | null): Promise<boolean>;
  /** Resolves false when the stored version is no longer `expectedVersion`. */
  replace(key: SessionKey, expectedVersion: number, state: EncodedState, expiresAt: Date | null): Promise<boolean>;
}

function isDuplicateKeyError(e: unknown) {
  return typeof e === "object" && e !== null && "code" in e && e.code === 11000;
}

export function mongooseSessionRows(model = DialogueSession): SessionRows {
  return {
    async find(key) {
      const doc = await model.findOne({ key }, { state: 1, version: 1 }).lean();
      if (!doc) return null;
      return { state: doc.state, version: doc.version };
    },

    async insert(key, state, expiresAt) {
      try {
        await model.create({ key, state, version: 1, expiresAt });
        return true;
      } catch (e) {
        if (isDuplicateKeyError(e)) return false;
        throw e;
      }
    },

    async replace(key, expectedVersion, state, expiresAt) {
      const res = await model.updateOne(
        { key, version: expectedVersion },
        { $set: { state, expiresAt }, $inc: { version: 1 } }
      );
      return res.matchedCount === 1;
    },
  };
}

type MongoStateStoreOptions = {
  maxAttempts: number;
  now?: () => Date;
};

/**
 * Durable store. Same-process callers queue on a keyed mutex; writers in
 * other processes are fenced by a compare-and-swap on `version`.
 */
export class MongoStateStore implements StateStore {
  private readonly mutex = new KeyedMutex();
  private readonly now: () => Date;

  constructor(
    private readonly rows: SessionRows,
    private readonly opts: MongoStateStoreOptions
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async load(key: SessionKey): Promise<DialogueState> {
    try {
      const row = await this.rows.find(key);
      return decodeState(row?.state);
    } catch (e) {
      throw new StoreError(`load failed for session ${key}`, { cause: e });
    }
  }

  async atomicUpdate(key: SessionKey, fn: (current: DialogueState) => DialogueState): Promise<DialogueState> {
    return this.mutex.run(key, () => this.compareAndSwap(key, fn));
  }

  private expiryFor(state: DialogueState) {
    return state.kind === "idle" ? new Date(this.now().getTime() + IDLE_TTL_MS) : null;
  }

  private async compareAndSwap(key: SessionKey, fn: (current: DialogueState) => DialogueState) {
    for (let attempt = 1; attempt <= this.opts.maxAttempts; attempt++) {
      let row: StoredRow | null;
      try {
        row = await this.rows.find(key);
      } catch (e) {
        throw new StoreError(`load failed for session ${key}`, { cause: e });
      }

      const next = fn(decodeState(row?.state));
      const encoded = encodeState(next);
      const expiresAt = this.expiryFor(next);

      let written: boolean;
      try {
        written = row
          ? await this.rows.replace(key, row.version, encoded, expiresAt)
          : await this.rows.insert(key, encoded, expiresAt);
      } catch (e) {
        throw new StoreError(`update failed for session ${key}`, { cause: e });
      }

      if (written) return next;
      console.warn(`[STORE] Concurrent write on session ${key}, retrying (attempt ${attempt})`);
    }

    throw new StoreError(`update for session ${key} lost the race ${this.opts.maxAttempts} times`);
  }
}
