// src/intake/transition.ts
//
// Pure dialogue transition: (state, inbound event) -> (next state, reply, commit?).
// No I/O, no clock, no logging. The session driver owns all side effects.

import { NEED_CATEGORIES, PROVIDE_CATEGORIES, type RequestCategory } from "./categories";
import {
  ASK_ADDRESS,
  ASK_COMMENT,
  ASK_FULL_NAME,
  ASK_PHONE_NUMBERS,
  CANCELLED,
  CATEGORY_TOKENS,
  CONFIRM_BUTTONS,
  CONFIRM_NO,
  CONFIRM_REPROMPT,
  CONFIRM_YES,
  NEED_MENU_PROMPT,
  OFFER_HELP,
  PROVIDE_MENU_PROMPT,
  REQUEST_HELP,
  SUBMITTED,
  TOP_MENU_BUTTONS,
  TOP_MENU_PROMPT,
  categoryButtons,
  summaryText,
} from "./copy";
import {
  IDLE,
  isCompleteRecord,
  isFieldPrefix,
  populatedFields,
  type CompleteRecord,
  type ContactRecord,
  type DialogueState,
} from "./dialogueState";

export type SessionKey = string;

export type InboundEvent = {
  sessionKey: SessionKey;
  text?: string | null;
};

export type Prompt = {
  text: string;
  suggestedReplies: string[];
};

export type CommitAction = {
  category: RequestCategory;
  record: CompleteRecord;
};

export type TransitionResult =
  | { outcome: "ignored"; next: DialogueState; reply: null; commit: null }
  | { outcome: "advanced"; next: DialogueState; reply: Prompt; commit: CommitAction | null }
  | { outcome: "reprompted"; next: DialogueState; reply: Prompt; commit: null }
  | { outcome: "invariant_violation"; next: DialogueState; reply: null; commit: null; detail: string };

function prompt(text: string, suggestedReplies: readonly string[] = []): Prompt {
  return { text, suggestedReplies: [...suggestedReplies] };
}

function advanced(next: DialogueState, reply: Prompt, commit: CommitAction | null = null): TransitionResult {
  return { outcome: "advanced", next, reply, commit };
}

const topMenu = () => prompt(TOP_MENU_PROMPT, TOP_MENU_BUTTONS);
const provideMenu = () => prompt(PROVIDE_MENU_PROMPT, categoryButtons(PROVIDE_CATEGORIES));
const needMenu = () => prompt(NEED_MENU_PROMPT, categoryButtons(NEED_CATEGORIES));

/**
 * The prompt for the step a state is waiting on. Unrecognized input re-sends
 * exactly this. Returns null for a record that breaks the field-order invariant.
 */
export function promptFor(state: DialogueState): Prompt | null {
  switch (state.kind) {
    case "idle":
      return topMenu();
    case "selecting_provide_category":
      return provideMenu();
    case "selecting_request_category":
      return needMenu();
    case "collecting_record": {
      if (!isFieldPrefix(state.record)) return null;
      switch (populatedFields(state.record).length) {
        case 0:
          return prompt(ASK_FULL_NAME);
        case 1:
          return prompt(ASK_PHONE_NUMBERS);
        case 2:
          return prompt(ASK_ADDRESS);
        case 3:
          return prompt(ASK_COMMENT);
        default:
          return prompt(CONFIRM_REPROMPT, CONFIRM_BUTTONS);
      }
    }
  }
}

function reprompt(state: DialogueState): TransitionResult {
  const reply = promptFor(state);
  if (!reply) return violation("no prompt for current step");
  return { outcome: "reprompted", next: state, reply, commit: null };
}

function matchCategory(text: string, categories: readonly RequestCategory[]): RequestCategory | null {
  return categories.find((c) => CATEGORY_TOKENS[c] === text) ?? null;
}

function violation(detail: string): TransitionResult {
  return { outcome: "invariant_violation", next: IDLE, reply: null, commit: null, detail };
}

function collect(
  category: RequestCategory,
  record: ContactRecord | null,
  text: string,
  current: DialogueState
): TransitionResult {
  if (!isFieldPrefix(record)) {
    return violation(`fields out of order: [${populatedFields(record).join(", ")}]`);
  }

  const stay = (next: ContactRecord, reply: Prompt) =>
    advanced({ kind: "collecting_record", category, record: next }, reply);

  switch (populatedFields(record).length) {
    case 0:
      return stay({ fullName: text }, prompt(ASK_PHONE_NUMBERS));
    case 1:
      return stay({ ...(record ?? {}), phoneNumbers: text }, prompt(ASK_ADDRESS));
    case 2:
      return stay({ ...(record ?? {}), address: text }, prompt(ASK_COMMENT));
    case 3: {
      const full = { ...(record ?? {}), comment: text };
      if (!isCompleteRecord(full)) return violation("record incomplete after comment");
      return stay(full, prompt(summaryText(full), CONFIRM_BUTTONS));
    }
  }

  // Awaiting confirmation
  if (!isCompleteRecord(record)) return violation("record incomplete at confirmation");

  if (text === CONFIRM_YES) {
    return advanced(IDLE, prompt(SUBMITTED, TOP_MENU_BUTTONS), { category, record });
  }
  if (text === CONFIRM_NO) {
    return advanced(IDLE, prompt(CANCELLED, TOP_MENU_BUTTONS));
  }
  return reprompt(current);
}

export function transition(state: DialogueState, event: Pick<InboundEvent, "text">): TransitionResult {
  // Tokens and field values are taken verbatim; only blank text is dropped
  const text = event.text ?? "";
  if (!text.trim()) return { outcome: "ignored", next: state, reply: null, commit: null };

  switch (state.kind) {
    case "idle": {
      if (text === OFFER_HELP) return advanced({ kind: "selecting_provide_category" }, provideMenu());
      if (text === REQUEST_HELP) return advanced({ kind: "selecting_request_category" }, needMenu());
      return reprompt(state);
    }

    case "selecting_provide_category": {
      const category = matchCategory(text, PROVIDE_CATEGORIES);
      if (!category) return reprompt(state);
      return advanced({ kind: "collecting_record", category, record: null }, prompt(ASK_FULL_NAME));
    }

    case "selecting_request_category": {
      const category = matchCategory(text, NEED_CATEGORIES);
      if (!category) return reprompt(state);
      return advanced({ kind: "collecting_record", category, record: null }, prompt(ASK_FULL_NAME));
    }

    case "collecting_record":
      return collect(state.category, state.record, text, state);
  }
}
