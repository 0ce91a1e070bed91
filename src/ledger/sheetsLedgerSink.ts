// src/ledger/sheetsLedgerSink.ts
import { DateTime } from "luxon";

import { SinkError } from "../errors";
import type { RequestCategory } from "../intake/categories";
import { FIELD_ORDER, isCompleteRecord, type CompleteRecord } from "../intake/dialogueState";
import type { LedgerSink } from "./ledgerSink";

export type AppendRequest = {
  spreadsheetId: string;
  range: string;
  valueInputOption: "USER_ENTERED" | "RAW";
  rows: string[][];
};

export type SheetsAppender = (req: AppendRequest) => Promise<{ updatedRange: string | null }>;

export type LedgerDestinations = Readonly<Record<RequestCategory, string>>;

type SheetsLedgerSinkOptions = {
  destinations: LedgerDestinations;
  range: string;     // e.g. "Sheet1"
  timezone: string;  // zone the timestamp column is written in, e.g. "UTC+3"
};

export function formatCommitTimestamp(at: Date, zone: string) {
  const dt = DateTime.fromJSDate(at, { zone });
  if (!dt.isValid) throw new SinkError(`Cannot render ${at.toISOString()} in zone "${zone}"`);
  return dt.toFormat("yyyy-MM-dd HH:mm:ss ZZ");
}

export class SheetsLedgerSink implements LedgerSink {
  constructor(
    private readonly appender: SheetsAppender,
    private readonly opts: SheetsLedgerSinkOptions
  ) {}

  /** name, phones, address, comment, timestamp */
  rowFor(record: CompleteRecord, committedAt: Date): string[] {
    return [...FIELD_ORDER.map((f) => record[f]), formatCommitTimestamp(committedAt, this.opts.timezone)];
  }

  async append(category: RequestCategory, record: CompleteRecord, committedAt: Date): Promise<void> {
    if (!isCompleteRecord(record)) {
      throw new SinkError(`Refusing to append incomplete ${category} record`);
    }

    const spreadsheetId = this.opts.destinations[category];
    const row = this.rowFor(record, committedAt);

    let updatedRange: string | null;
    try {
      ({ updatedRange } = await this.appender({
        spreadsheetId,
        range: this.opts.range,
        valueInputOption: "USER_ENTERED",
        rows: [row],
      }));
    } catch (e) {
      throw new SinkError(`Append to ${category} sheet failed`, { cause: e });
    }

    console.log(`[LEDGER] Appended ${category} row to ${updatedRange ?? spreadsheetId}`);
  }
}
