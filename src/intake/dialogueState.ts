// src/intake/dialogueState.ts
import { isRequestCategory, type RequestCategory } from "./categories";

/* ----------------------------
   Record
----------------------------- */

export type RecordField = "fullName" | "phoneNumbers" | "address" | "comment";

// Fields are collected strictly in this order.
export const FIELD_ORDER: readonly RecordField[] = ["fullName", "phoneNumbers", "address", "comment"];

export type ContactRecord = Partial<Record<RecordField, string>>;

export type CompleteRecord = Record<RecordField, string>;

function isSet(value: string | undefined): value is string {
  return typeof value === "string" && value.length > 0;
}

export function populatedFields(record: ContactRecord | null): RecordField[] {
  if (!record) return [];
  return FIELD_ORDER.filter((f) => isSet(record[f]));
}

/** True when the set fields are exactly the first N of FIELD_ORDER. */
export function isFieldPrefix(record: ContactRecord | null): boolean {
  const populated = populatedFields(record);
  return populated.every((f, i) => FIELD_ORDER[i] === f);
}

export function isCompleteRecord(record: ContactRecord | null): record is CompleteRecord {
  return populatedFields(record).length === FIELD_ORDER.length;
}

/* ----------------------------
   Dialogue state
----------------------------- */

export type DialogueState =
  | { kind: "idle" }
  | { kind: "selecting_provide_category" }
  | { kind: "selecting_request_category" }
  | { kind: "collecting_record"; category: RequestCategory; record: ContactRecord | null };

export const IDLE: DialogueState = { kind: "idle" };

/* ----------------------------
   Codec
   Stored shape is plain JSON; decode falls back to idle on anything malformed.
----------------------------- */

export type EncodedState =
  | { kind: "idle" | "selecting_provide_category" | "selecting_request_category" }
  | { kind: "collecting_record"; category: RequestCategory; record: ContactRecord | null };

export function encodeState(state: DialogueState): EncodedState {
  if (state.kind !== "collecting_record") return { kind: state.kind };

  let record: ContactRecord | null = null;
  if (state.record) {
    record = {};
    for (const f of FIELD_ORDER) {
      const v = state.record[f];
      if (isSet(v)) record[f] = v;
    }
  }

  return { kind: "collecting_record", category: state.category, record };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeRecord(raw: unknown): ContactRecord | null | undefined {
  if (raw === null || raw === undefined) return null;
  if (!isPlainObject(raw)) return undefined;

  const record: ContactRecord = {};
  for (const f of FIELD_ORDER) {
    const v = raw[f];
    if (v === undefined || v === null) continue;
    if (typeof v !== "string") return undefined;
    if (v.length > 0) record[f] = v;
  }
  return record;
}

export function decodeState(raw: unknown): DialogueState {
  if (raw === null || raw === undefined) return IDLE;

  if (isPlainObject(raw)) {
    switch (raw.kind) {
      case "idle":
        return IDLE;
      case "selecting_provide_category":
        return { kind: "selecting_provide_category" };
      case "selecting_request_category":
        return { kind: "selecting_request_category" };
      case "collecting_record": {
        const record = decodeRecord(raw.record);
        if (isRequestCategory(raw.category) && record !== undefined) {
          return { kind: "collecting_record", category: raw.category, record };
        }
        break;
      }
    }
  }

  console.warn("[STORE] Unreadable dialogue state, treating as idle:", raw);
  return IDLE;
}
