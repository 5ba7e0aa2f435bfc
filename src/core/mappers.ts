import { z } from "zod";
import { AppError, ErrorKind } from "../errors.js";
import type { NewStoredMessage, StoredMessage } from "../storage/message-store.js";
import { describeIssues, exportMessageSchema } from "./export-schema.js";
import type { ChatMessage, SenderIdentity } from "./types.js";

export const GROUP_CHAT_SUFFIX = "@g.us";
export const USER_ADDRESS_MARKER = "@s.whatsapp.net";

export const SELF_SENDER = "Me";
export const RAW_ADDRESS_SENDER = "Them";
export const UNKNOWN_SENDER = "Unknown Sender";

// A local wall-clock time would be read in the converting host's zone.
const UTC_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

const messageKindSchema = z.object({ type: z.unknown() }).passthrough();

export interface ChatContext {
  contactName: string;
  isGroupChat: boolean;
}

export type MappedMessage =
  | { kind: "text"; record: NewStoredMessage }
  | { kind: "ignored"; type: string };

export function isGroupChatKey(key: string | null | undefined): boolean {
  return typeof key === "string" && key.endsWith(GROUP_CHAT_SUFFIX);
}

export function resolveSenderName(identity: SenderIdentity): string {
  if (identity.fromMe) return SELF_SENDER;

  const candidate = identity.isGroupChat
    ? identity.remoteResourceDisplayName
    : identity.contactName;
  if (!candidate) return UNKNOWN_SENDER;

  if (candidate.includes(USER_ADDRESS_MARKER)) return RAW_ADDRESS_SENDER;
  const spaceIndex = candidate.indexOf(" ");
  return spaceIndex === -1 ? candidate : candidate.slice(0, spaceIndex);
}

/**
 * Maps one raw export message to a store record. Non-text messages come back
 * as `ignored`; a text message missing its timestamp or body throws a
 * `data` error so the caller can skip it.
 */
export function mapExportMessage(raw: unknown, chat: ChatContext): MappedMessage {
  const kind = messageKindSchema.safeParse(raw);
  if (!kind.success) {
    throw new AppError(ErrorKind.DATA, "message is not an object");
  }
  if (kind.data.type !== "text") {
    return {
      kind: "ignored",
      type: typeof kind.data.type === "string" ? kind.data.type : "unknown",
    };
  }

  const parsed = exportMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError(ErrorKind.DATA, describeIssues(parsed.error));
  }

  const message = parsed.data;
  if (message.text === null || message.text === undefined) {
    throw new AppError(ErrorKind.DATA, "missing text");
  }
  if (message.text.length === 0) {
    throw new AppError(ErrorKind.DATA, "text is empty");
  }
  if (!message.timestamp) {
    throw new AppError(ErrorKind.DATA, "missing timestamp");
  }

  const timestampMs = Date.parse(message.timestamp);
  if (Number.isNaN(timestampMs)) {
    throw new AppError(ErrorKind.DATA, `unparseable timestamp: ${message.timestamp}`);
  }
  if (!UTC_DESIGNATOR.test(message.timestamp)) {
    throw new AppError(ErrorKind.DATA, `timestamp has no UTC offset: ${message.timestamp}`);
  }

  const fromMe = message.fromMe ?? false;
  return {
    kind: "text",
    record: {
      contact_name: chat.contactName,
      timestamp: message.timestamp,
      timestamp_ms: timestampMs,
      from_me: fromMe ? 1 : 0,
      sender_name: resolveSenderName({
        fromMe,
        isGroupChat: chat.isGroupChat,
        contactName: chat.contactName,
        remoteResourceDisplayName: message.remoteResourceDisplayName,
      }),
      text: message.text,
    },
  };
}

export function mapStoredMessage(row: StoredMessage): ChatMessage {
  return {
    id: row.id,
    contactName: row.contact_name,
    timestamp: row.timestamp,
    timestampMs: row.timestamp_ms,
    fromMe: Boolean(row.from_me),
    senderName: row.sender_name,
    text: row.text,
  };
}
