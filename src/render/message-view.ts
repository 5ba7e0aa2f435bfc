import { SELF_SENDER } from "../core/mappers.js";
import type { AssembledConversation, ChatMessage } from "../core/types.js";
import { formatClockTime } from "../utils/timezone.js";
import { escapeHtml, formatMessageBody } from "./escape.js";

/** A message with every field already escaped or formatted for markup. */
export interface MessageView {
  fromMe: boolean;
  time: string;
  bodyHtml: string;
  senderHtml: string | null;
}

export interface ConversationView {
  contactName: string;
  slug: string;
  prev: MessageView[];
  current: MessageView[];
  next: MessageView[];
}

function distinctReceivedSenders(conversation: AssembledConversation): number {
  const senders = new Set<string>();
  for (const message of [...conversation.prev, ...conversation.current, ...conversation.next]) {
    if (!message.fromMe && message.senderName !== SELF_SENDER) {
      senders.add(message.senderName);
    }
  }
  return senders.size;
}

export function toMessageView(
  message: ChatMessage,
  timeZone: string,
  showSender: boolean,
): MessageView {
  return {
    fromMe: message.fromMe,
    time: formatClockTime(message.timestampMs, timeZone),
    bodyHtml: formatMessageBody(message.text),
    senderHtml: showSender && !message.fromMe ? escapeHtml(message.senderName) : null,
  };
}

/**
 * Display form of an assembled conversation in `timeZone`. Sender names are
 * kept only where more than one other person speaks.
 */
export function toConversationView(
  conversation: AssembledConversation,
  timeZone: string,
): ConversationView {
  const showSender = distinctReceivedSenders(conversation) > 1;
  const view = (messages: ChatMessage[]) =>
    messages.map((message) => toMessageView(message, timeZone, showSender));
  return {
    contactName: conversation.contactName,
    slug: conversation.slug,
    prev: view(conversation.prev),
    current: view(conversation.current),
    next: view(conversation.next),
  };
}
