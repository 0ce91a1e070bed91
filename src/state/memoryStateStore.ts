// src/state/memoryStateStore.ts
import { decodeState, encodeState, type DialogueState } from "../intake/dialogueState";
import type { SessionKey } from "../intake/transition";
import { KeyedMutex } from "./keyedMutex";
import type { StateStore } from "./stateStore";

/**
 * In-process store. Keeps the encoded JSON rather than live objects so a
 * load always goes through the same codec as the durable store.
 */
export class MemoryStateStore implements StateStore {
  private readonly rows = new Map<SessionKey, string>();
  private readonly mutex = new KeyedMutex();

  async load(key: SessionKey): Promise<DialogueState> {
    const raw = this.rows.get(key);
    return raw === undefined ? decodeState(null) : decodeState(JSON.parse(raw));
  }

  async atomicUpdate(key: SessionKey, fn: (current: DialogueState) => DialogueState): Promise<DialogueState> {
    return this.mutex.run(key, async () => {
      const current = await this.load(key);
      const next = fn(current);
      await this.save(key, next);
      return next;
    });
  }

  /** Sessions not idle. */
  get activeCount() {
    return this.rows.size;
  }

  private async save(key: SessionKey, state: DialogueState) {
    // idle is the same as absent
    if (state.kind === "idle") {
      this.rows.delete(key);
      return;
    }
    this.rows.set(key, JSON.stringify(encodeState(state)));
  }
}
