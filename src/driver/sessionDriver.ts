// src/driver/sessionDriver.ts
import { StoreError, TransportError } from "../errors";
import type { DialogueState } from "../intake/dialogueState";
import { transition, type CommitAction, type InboundEvent, type TransitionResult } from "../intake/transition";
import type { LedgerSink } from "../ledger/ledgerSink";
import type { StateStore } from "../state/stateStore";
import type { ChatTransport, OutboundReply } from "../transport/chatTransport";
import { withTimeout } from "../utils/timeout";

export type CommitStatus = "none" | "appended" | "failed";

export type HandleResult = {
  state: DialogueState;
  reply: OutboundReply | null;
  delivered: boolean;
  committed: CommitStatus;
};

export type SessionDriverDeps = {
  store: StateStore;
  transport: ChatTransport;
  sink: LedgerSink;
  timeouts: { replyMs: number; ledgerMs: number };
  clock?: () => Date;
};

/**
 * Runs one inbound event through load -> transition -> persist -> reply -> ledger.
 *
 * Store errors propagate: nothing was persisted or sent, so the caller may
 * retry the whole event. Anything after the persist is logged and reported in
 * the result instead, because re-running the transition would apply it twice.
 */
export class SessionDriver {
  private readonly clock: () => Date;

  constructor(private readonly deps: SessionDriverDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async handle(event: InboundEvent): Promise<HandleResult> {
    const key = event.sessionKey;

    // fn may run more than once under contention; keep the last result
    const last: { result?: TransitionResult } = {};
    const state = await this.deps.store.atomicUpdate(key, (current) => {
      last.result = transition(current, event);
      return last.result.next;
    });

    const result = last.result;
    if (!result) throw new StoreError(`store returned without applying the transition for session ${key}`);
    const committedAt = result.commit ? this.clock() : null;

    switch (result.outcome) {
      case "ignored":
        return { state, reply: null, delivered: false, committed: "none" };
      case "invariant_violation":
        console.error(`[DRIVER] Malformed record in session ${key} (${result.detail}), reset to idle`);
        return { state, reply: null, delivered: false, committed: "none" };
      case "reprompted":
        console.warn(`[DRIVER] Unrecognized input in session ${key} at ${state.kind}:`, event.text);
        break;
      case "advanced":
        console.log(`[DRIVER] Session ${key} -> ${state.kind}`);
        break;
    }

    const reply: OutboundReply = { sessionKey: key, ...result.reply };
    let delivered = false;
    try {
      await this.deliver(reply);
      delivered = true;
    } catch (e) {
      console.error(`[DRIVER] Reply to session ${key} not delivered; state already at ${state.kind}:`, e);
    }

    const committed = result.commit && committedAt ? await this.commit(key, result.commit, committedAt) : "none";

    return { state, reply, delivered, committed };
  }

  /** Sends a reply without touching session state. Safe to call again after a TransportError. */
  async deliver(reply: OutboundReply): Promise<void> {
    try {
      await withTimeout(this.deps.transport.send(reply), this.deps.timeouts.replyMs, "send reply");
    } catch (e) {
      throw new TransportError(`send to session ${reply.sessionKey} failed`, { cause: e });
    }
  }

  private async commit(key: string, action: CommitAction, committedAt: Date): Promise<CommitStatus> {
    try {
      await withTimeout(
        this.deps.sink.append(action.category, action.record, committedAt),
        this.deps.timeouts.ledgerMs,
        "ledger append"
      );
      return "appended";
    } catch (e) {
      // The user was already told it was sent; this line is the only copy left
      console.error("[LEDGER] Append FAILED, record needs manual entry:", {
        sessionKey: key,
        category: action.category,
        record: action.record,
        committedAt: committedAt.toISOString(),
        error: e instanceof Error ? e.message : String(e),
      });
      return "failed";
    }
  }
}
