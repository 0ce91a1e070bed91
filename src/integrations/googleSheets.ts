// src/integrations/googleSheets.ts
import { google } from "googleapis";
import type { SheetsAppender } from "../ledger/sheetsLedgerSink";

export type GoogleCredentials = {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
};

function getOAuthClient(creds: GoogleCredentials) {
  const oauth2 = new google.auth.OAuth2(creds.clientId, creds.clientSecret);
  // access tokens are refreshed by the client as needed
  oauth2.setCredentials({ refresh_token: creds.refreshToken });
  return oauth2;
}

export function createSheetsAppender(creds: GoogleCredentials): SheetsAppender {
  const sheets = google.sheets({ version: "v4", auth: getOAuthClient(creds) });

  return async ({ spreadsheetId, range, valueInputOption, rows }) => {
    const res = await sheets.spreadsheets.values.append({
      spreadsheetId,
      range,
      valueInputOption,
      includeValuesInResponse: true,
      requestBody: {
        majorDimension: "ROWS",
        values: rows,
      },
    });

    return { updatedRange: res.data.updates?.updatedRange ?? null };
  };
}
