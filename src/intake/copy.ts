// src/intake/copy.ts
import type { RequestCategory } from "./categories";

/* ----------------------------
   Button tokens
   Matched exactly (after trimming) against inbound text.
----------------------------- */

export const OFFER_HELP = "I can help";
export const REQUEST_HELP = "I need help";

export const CATEGORY_TOKENS: Record<RequestCategory, string> = {
  providing_driver: "I'm a driver with my own car",
  providing_collecting_aid: "I can collect humanitarian or financial aid",
  providing_useful_contact: "Useful contacts",
  need_evacuation: "Evacuation",
  need_humanitarian_aid: "I need humanitarian aid",
};

export const CONFIRM_YES = "Yes, send it to the volunteers";
export const CONFIRM_NO = "No, start over";

/* ----------------------------
   Prompts
----------------------------- */

export const TOP_MENU_PROMPT = `Choose "${OFFER_HELP}" or "${REQUEST_HELP}".`;

export const PROVIDE_MENU_PROMPT =
  "Right now we coordinate drivers who help with evacuation, collect humanitarian aid, " +
  "and we are always glad to hear about useful contacts. Choose one of the options.";

export const NEED_MENU_PROMPT = "Right now we coordinate evacuation requests and humanitarian aid.";

export const ASK_FULL_NAME = "Your full name? (surname, first name, patronymic)";
export const ASK_PHONE_NUMBERS = "Contact phone numbers?";
export const ASK_ADDRESS = "Address?";
export const COMMENT_PLACEHOLDER = "-";
export const ASK_COMMENT = `Any additional comment? (if there is nothing to add, send "${COMMENT_PLACEHOLDER}")`;

export const CONFIRM_QUESTION = "Do you want to send this request to the volunteers?";
export const CONFIRM_REPROMPT = `Do you want to send the request to the volunteers? (send only "${CONFIRM_YES}" or "${CONFIRM_NO}")`;

export const SUBMITTED =
  "Thank you! Your information has been sent to the volunteers.\n\n" +
  "Wait until someone contacts you. You can also send another request.";

export const CANCELLED = "OK, your request has been cancelled. You can start again.";

export function summaryText(fields: {
  fullName: string;
  phoneNumbers: string;
  address: string;
  comment: string;
}) {
  const lines: string[] = [];
  lines.push("Here is the information we collected:");
  lines.push(`Full name: ${fields.fullName}`);
  lines.push(`Phone numbers: ${fields.phoneNumbers}`);
  lines.push(`Address: ${fields.address}`);
  lines.push(`Comment: ${fields.comment}`);
  lines.push("");
  lines.push(CONFIRM_QUESTION);
  return lines.join("\n");
}

/* ----------------------------
   Keyboards (one row each)
----------------------------- */

export const TOP_MENU_BUTTONS: readonly string[] = [OFFER_HELP, REQUEST_HELP];

export function categoryButtons(categories: readonly RequestCategory[]): string[] {
  return categories.map((c) => CATEGORY_TOKENS[c]);
}

export const CONFIRM_BUTTONS: readonly string[] = [CONFIRM_YES, CONFIRM_NO];
