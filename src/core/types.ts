/** A normalized message as held by the store and read back for rendering. */
export interface ChatMessage {
  id: number;
  contactName: string;
  /** Raw UTC timestamp exactly as it appeared in the export. */
  timestamp: string;
  timestampMs: number;
  fromMe: boolean;
  senderName: string;
  text: string;
}

export interface SenderIdentity {
  fromMe: boolean;
  isGroupChat: boolean;
  contactName: string | null | undefined;
  remoteResourceDisplayName: string | null | undefined;
}

export type Bucket = "prev" | "current" | "next";

/** Half-open UTC range `[startMs, endMs)`. */
export interface TimeRange {
  startMs: number;
  endMs: number;
}

export interface AssembledConversation {
  contactName: string;
  slug: string;
  prev: ChatMessage[];
  current: ChatMessage[];
  next: ChatMessage[];
  firstCurrentTimestampMs: number;
}
