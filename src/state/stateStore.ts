// src/state/stateStore.ts
import type { DialogueState } from "../intake/dialogueState";
import type { SessionKey } from "../intake/transition";

/**
 * Durable SessionKey -> DialogueState mapping.
 *
 * `atomicUpdate` is the only write path. Implementations must make the
 * read, `fn` and write one unit per key, and may call `fn` more than once
 * on contention, so `fn` has to be pure. A key never written loads as idle.
 */
export interface StateStore {
  load(key: SessionKey): Promise<DialogueState>;
  atomicUpdate(key: SessionKey, fn: (current: DialogueState) => DialogueState): Promise<DialogueState>;
}
