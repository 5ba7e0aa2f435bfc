import type { AssembledConversation, Bucket, ChatMessage } from "../core/types.js";
import { bucketFor, type DayWindows } from "./day-windows.js";

export function contactSlug(contactName: string): string {
  return encodeURIComponent(contactName);
}

/** Groups by contact name in order of first appearance; input order is not assumed. */
export function groupByContact(messages: readonly ChatMessage[]): Map<string, ChatMessage[]> {
  const groups = new Map<string, ChatMessage[]>();
  for (const message of messages) {
    const group = groups.get(message.contactName);
    if (group) {
      group.push(message);
    } else {
      groups.set(message.contactName, [message]);
    }
  }
  return groups;
}

/**
 * Splits each contact's messages into prev/current/next buckets, drops
 * contacts with nothing on the target day and orders the rest by their first
 * message of that day. Ties keep grouping order.
 */
export function assembleConversations(
  messages: readonly ChatMessage[],
  windows: DayWindows,
): AssembledConversation[] {
  const conversations: AssembledConversation[] = [];

  for (const [contactName, group] of groupByContact(messages)) {
    const buckets: Record<Bucket, ChatMessage[]> = { prev: [], current: [], next: [] };
    const chronological = [...group].sort(
      (a, b) => a.timestampMs - b.timestampMs || a.id - b.id,
    );

    for (const message of chronological) {
      const bucket = bucketFor(message.timestampMs, windows);
      if (bucket) {
        buckets[bucket].push(message);
      }
    }

    const [firstCurrent] = buckets.current;
    if (!firstCurrent) continue;

    conversations.push({
      contactName,
      slug: contactSlug(contactName),
      prev: buckets.prev,
      current: buckets.current,
      next: buckets.next,
      firstCurrentTimestampMs: firstCurrent.timestampMs,
    });
  }

  return conversations.sort((a, b) => a.firstCurrentTimestampMs - b.firstCurrentTimestampMs);
}
