import test from "node:test";
import assert from "node:assert/strict";
import { SessionDriver } from "./sessionDriver";
import { MemoryStateStore } from "../state/memoryStateStore";
import type { StateStore } from "../state/stateStore";
import type { ChatTransport, OutboundReply } from "../transport/chatTransport";
import type { LedgerSink } from "../ledger/ledgerSink";
import type { RequestCategory } from "../intake/categories";
import { IDLE, type CompleteRecord, type DialogueState } from "../intake/dialogueState";
import { ASK_FULL_NAME, CONFIRM_YES, CONFIRM_NO, CONFIRM_REPROMPT, SUBMITTED } from "../intake/copy";
import { StoreError, TransportError } from "../errors";
import { sleep } from "../utils/timeout";

const COMMITTED_AT = new Date("2026-03-01T10:00:00.000Z");

type Appended = { category: RequestCategory; record: CompleteRecord; committedAt: Date };

function recordingTransport(onSend?: (reply: OutboundReply) => Promise<void> | void) {
  const sent: OutboundReply[] = [];
  const transport: ChatTransport = {
    async send(reply) {
      await onSend?.(reply);
      sent.push(reply);
    },
  };
  return { sent, transport };
}

function recordingSink(fail?: Error) {
  const appended: Appended[] = [];
  const sink: LedgerSink = {
    async append(category, record, committedAt) {
      if (fail) throw fail;
      appended.push({ category, record, committedAt });
    },
  };
  return { appended, sink };
}

function makeDriver(opts: {
  store?: StateStore;
  transport?: ChatTransport;
  sink?: LedgerSink;
  replyMs?: number;
  ledgerMs?: number;
  clock?: () => Date;
}) {
  const store = opts.store ?? new MemoryStateStore();
  const transport = opts.transport ?? recordingTransport().transport;
  const sink = opts.sink ?? recordingSink().sink;
  const driver = new SessionDriver({
    store,
    transport,
    sink,
    timeouts: { replyMs: opts.replyMs ?? 1000, ledgerMs: opts.ledgerMs ?? 1000 },
    clock: opts.clock ?? (() => COMMITTED_AT),
  });
  return { driver, store };
}

const FULL_RECORD: CompleteRecord = {
  fullName: "Jane Doe",
  phoneNumbers: "555-0100",
  address: "12 Main St",
  comment: "-",
};

const AWAITING_CONFIRMATION: DialogueState = {
  kind: "collecting_record",
  category: "providing_driver",
  record: FULL_RECORD,
};

test("SessionDriver: full intake from first contact to ledger append", async (t) => {
  t.mock.method(console, "log", () => {});
  const { sent, transport } = recordingTransport();
  const { appended, sink } = recordingSink();
  const { driver, store } = makeDriver({ transport, sink });

  const inputs = ["I can help", "I'm a driver with my own car", "Jane Doe", "555-0100", "12 Main St", "-"];
  for (const text of inputs) await driver.handle({ sessionKey: "42", text });

  assert.deepEqual(await store.load("42"), AWAITING_CONFIRMATION);
  assert.equal(sent.length, inputs.length);
  assert.ok(sent[5].text.includes("Full name: Jane Doe"));
  assert.ok(sent[5].text.includes("Address: 12 Main St"));

  const result = await driver.handle({ sessionKey: "42", text: CONFIRM_YES });

  assert.deepEqual(result.state, IDLE);
  assert.equal(result.delivered, true);
  assert.equal(result.committed, "appended");
  assert.deepEqual(result.reply, {
    sessionKey: "42",
    text: SUBMITTED,
    suggestedReplies: ["I can help", "I need help"],
  });
  assert.deepEqual(appended, [{ category: "providing_driver", record: FULL_RECORD, committedAt: COMMITTED_AT }]);
  assert.deepEqual(await store.load("42"), IDLE);
});

test("SessionDriver: state is persisted before the reply goes out", async (t) => {
  t.mock.method(console, "log", () => {});
  const store = new MemoryStateStore();
  const seenAtSend: DialogueState[] = [];
  const { transport } = recordingTransport(async (reply) => {
    seenAtSend.push(await store.load(reply.sessionKey));
  });
  const { driver } = makeDriver({ store, transport });

  await driver.handle({ sessionKey: "42", text: "I need help" });
  await driver.handle({ sessionKey: "42", text: "Evacuation" });

  assert.deepEqual(seenAtSend, [
    { kind: "selecting_request_category" },
    { kind: "collecting_record", category: "need_evacuation", record: null },
  ]);
});

test("SessionDriver: store failure leaves the event unprocessed", async () => {
  const { sent, transport } = recordingTransport();
  const { appended, sink } = recordingSink();
  const failing: StateStore = {
    load: async () => {
      throw new StoreError("down");
    },
    atomicUpdate: async () => {
      throw new StoreError("down");
    },
  };
  const { driver } = makeDriver({ store: failing, transport, sink });

  await assert.rejects(driver.handle({ sessionKey: "42", text: "I can help" }), StoreError);
  assert.equal(sent.length, 0);
  assert.equal(appended.length, 0);
});

test("SessionDriver: failed reply keeps the advanced state and can be re-sent alone", async (t) => {
  t.mock.method(console, "log", () => {});
  const errors = t.mock.method(console, "error", () => {});
  let attempts = 0;
  const { sent, transport } = recordingTransport(() => {
    attempts++;
    if (attempts === 1) throw new Error("network unreachable");
  });
  const { driver, store } = makeDriver({ transport });
  await store.atomicUpdate("42", () => ({ kind: "selecting_provide_category" }));

  const result = await driver.handle({ sessionKey: "42", text: "Useful contacts" });

  assert.equal(result.delivered, false);
  assert.deepEqual(result.state, { kind: "collecting_record", category: "providing_useful_contact", record: null });
  assert.deepEqual(await store.load("42"), result.state);
  assert.equal(errors.mock.callCount(), 1);

  assert.ok(result.reply);
  await driver.deliver(result.reply);
  assert.deepEqual(sent, [{ sessionKey: "42", text: ASK_FULL_NAME, suggestedReplies: [] }]);
  assert.deepEqual(await store.load("42"), result.state);
});

test("SessionDriver: deliver wraps transport errors", async () => {
  const { transport } = recordingTransport(() => {
    throw new Error("blocked by user");
  });
  const { driver } = makeDriver({ transport });

  await assert.rejects(driver.deliver({ sessionKey: "42", text: "hi", suggestedReplies: [] }), TransportError);
});

test("SessionDriver: a hanging transport is cut off by the reply timeout", async (t) => {
  t.mock.method(console, "log", () => {});
  t.mock.method(console, "error", () => {});
  const { transport } = recordingTransport(() => sleep(200));
  const { driver } = makeDriver({ transport, replyMs: 10 });

  const result = await driver.handle({ sessionKey: "42", text: "I can help" });

  assert.equal(result.delivered, false);
  assert.deepEqual(result.state, { kind: "selecting_provide_category" });
});

test("SessionDriver: ledger failure still resets to idle and is logged with the record", async (t) => {
  t.mock.method(console, "log", () => {});
  const errors = t.mock.method(console, "error", () => {});
  const { sent, transport } = recordingTransport();
  const { sink } = recordingSink(new Error("sheet not found"));
  const { driver, store } = makeDriver({ transport, sink });
  await store.atomicUpdate("42", () => AWAITING_CONFIRMATION);

  const result = await driver.handle({ sessionKey: "42", text: CONFIRM_YES });

  assert.equal(result.committed, "failed");
  assert.deepEqual(result.state, IDLE);
  assert.deepEqual(await store.load("42"), IDLE);
  assert.equal(sent[0].text, SUBMITTED);

  assert.equal(errors.mock.callCount(), 1);
  assert.deepEqual(errors.mock.calls[0].arguments, [
    "[LEDGER] Append FAILED, record needs manual entry:",
    {
      sessionKey: "42",
      category: "providing_driver",
      record: FULL_RECORD,
      committedAt: "2026-03-01T10:00:00.000Z",
      error: "sheet not found",
    },
  ]);
});

test("SessionDriver: ledger append still runs after a failed reply and is cut off by its timeout", async (t) => {
  t.mock.method(console, "log", () => {});
  const errors = t.mock.method(console, "error", () => {});
  const { transport } = recordingTransport(() => {
    throw new Error("network unreachable");
  });
  let appendCalls = 0;
  const hangingSink: LedgerSink = {
    async append() {
      appendCalls++;
      await sleep(200);
    },
  };
  const { driver, store } = makeDriver({ transport, sink: hangingSink, ledgerMs: 10 });
  await store.atomicUpdate("42", () => AWAITING_CONFIRMATION);

  const result = await driver.handle({ sessionKey: "42", text: CONFIRM_YES });

  assert.equal(result.delivered, false);
  assert.equal(result.committed, "failed");
  assert.deepEqual(result.state, IDLE);
  assert.deepEqual(await store.load("42"), IDLE);
  assert.equal(appendCalls, 1);

  const ledgerLines = errors.mock.calls.filter((c) => c.arguments[0] === "[LEDGER] Append FAILED, record needs manual entry:");
  assert.equal(ledgerLines.length, 1);
  assert.deepEqual(ledgerLines[0].arguments[1], {
    sessionKey: "42",
    category: "providing_driver",
    record: FULL_RECORD,
    committedAt: "2026-03-01T10:00:00.000Z",
    error: "ledger append timed out after 10ms",
  });
});

test("SessionDriver: commit time is taken before the reply is sent", async (t) => {
  t.mock.method(console, "log", () => {});
  const times = [new Date("2026-03-01T10:00:00.000Z"), new Date("2026-03-01T10:05:00.000Z")];
  let tick = 0;
  const clock = () => times[Math.min(tick, times.length - 1)];
  // the clock moves on while the reply is in flight
  const { transport } = recordingTransport(() => {
    tick++;
  });
  const { appended, sink } = recordingSink();
  const { driver, store } = makeDriver({ transport, sink, clock });
  await store.atomicUpdate("42", () => AWAITING_CONFIRMATION);

  await driver.handle({ sessionKey: "42", text: CONFIRM_YES });

  assert.deepEqual(appended.map((a) => a.committedAt), [new Date("2026-03-01T10:00:00.000Z")]);
});

test("SessionDriver: declining resets without touching the ledger", async (t) => {
  t.mock.method(console, "log", () => {});
  const { appended, sink } = recordingSink();
  const { driver, store } = makeDriver({ sink });
  await store.atomicUpdate("42", () => AWAITING_CONFIRMATION);

  const result = await driver.handle({ sessionKey: "42", text: CONFIRM_NO });

  assert.equal(result.committed, "none");
  assert.deepEqual(result.state, IDLE);
  assert.equal(appended.length, 0);
});

test("SessionDriver: unrelated text at confirmation re-asks and commits nothing", async (t) => {
  t.mock.method(console, "warn", () => {});
  const { appended, sink } = recordingSink();
  const { sent, transport } = recordingTransport();
  const { driver, store } = makeDriver({ sink, transport });
  await store.atomicUpdate("42", () => AWAITING_CONFIRMATION);

  const result = await driver.handle({ sessionKey: "42", text: "hmm" });

  assert.deepEqual(result.state, AWAITING_CONFIRMATION);
  assert.equal(result.committed, "none");
  assert.equal(appended.length, 0);
  assert.equal(sent[0].text, CONFIRM_REPROMPT);
});

test("SessionDriver: non-text events send nothing", async () => {
  const { sent, transport } = recordingTransport();
  const { driver, store } = makeDriver({ transport });
  await store.atomicUpdate("42", () => ({ kind: "selecting_provide_category" }));

  const result = await driver.handle({ sessionKey: "42", text: null });

  assert.equal(result.reply, null);
  assert.equal(sent.length, 0);
  assert.deepEqual(await store.load("42"), { kind: "selecting_provide_category" });
});

test("SessionDriver: malformed record is reset silently and logged", async (t) => {
  const errors = t.mock.method(console, "error", () => {});
  const { sent, transport } = recordingTransport();
  const { driver, store } = makeDriver({ transport });
  await store.atomicUpdate("42", () => ({
    kind: "collecting_record",
    category: "need_evacuation",
    record: { phoneNumbers: "555-0100" },
  }));

  const result = await driver.handle({ sessionKey: "42", text: "Jane Doe" });

  assert.deepEqual(result.state, IDLE);
  assert.equal(sent.length, 0);
  assert.equal(errors.mock.callCount(), 1);
});

test("SessionDriver: simultaneous messages from one chat are both captured", async (t) => {
  t.mock.method(console, "log", () => {});
  // slow transport widens the window between events
  const { transport } = recordingTransport(() => sleep(5));
  const { driver, store } = makeDriver({ transport });
  await store.atomicUpdate("42", () => ({ kind: "collecting_record", category: "need_humanitarian_aid", record: null }));

  await Promise.all([
    driver.handle({ sessionKey: "42", text: "Jane Doe" }),
    driver.handle({ sessionKey: "42", text: "555-0100" }),
  ]);

  assert.deepEqual(await store.load("42"), {
    kind: "collecting_record",
    category: "need_humanitarian_aid",
    record: { fullName: "Jane Doe", phoneNumbers: "555-0100" },
  });
});

test("SessionDriver: sessions do not share state", async (t) => {
  t.mock.method(console, "log", () => {});
  const { driver, store } = makeDriver({});

  await Promise.all([
    driver.handle({ sessionKey: "1", text: "I can help" }),
    driver.handle({ sessionKey: "2", text: "I need help" }),
  ]);

  assert.deepEqual(await store.load("1"), { kind: "selecting_provide_category" });
  assert.deepEqual(await store.load("2"), { kind: "selecting_request_category" });
});
