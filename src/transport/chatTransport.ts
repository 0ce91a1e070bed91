// src/transport/chatTransport.ts
import type { Prompt, SessionKey } from "../intake/transition";

export type OutboundReply = Prompt & { sessionKey: SessionKey };

export interface ChatTransport {
  send(reply: OutboundReply): Promise<void>;
}
