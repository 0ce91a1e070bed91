// src/ledger/ledgerSink.ts
import type { RequestCategory } from "../intake/categories";
import type { CompleteRecord } from "../intake/dialogueState";

/**
 * Append-only destination for completed records, one destination per category.
 * Rejects with SinkError when the row could not be written.
 */
export interface LedgerSink {
  append(category: RequestCategory, record: CompleteRecord, committedAt: Date): Promise<void>;
}
