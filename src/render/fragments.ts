import { escapeHtml } from "./escape.js";
import type { ConversationView, MessageView } from "./message-view.js";

export interface DayLabels {
  prev: string;
  current: string;
  next: string;
}

type Direction = "prev" | "next";

const DISCLOSURE_TEXT: Record<Direction, string> = {
  prev: "&#9650; Previous day",
  next: "Next day &#9660;",
};

export function panelId(direction: Direction, slug: string): string {
  return `${direction}-${slug}`;
}

export function renderMessage(message: MessageView): string[] {
  const lines = [`    <div class="message ${message.fromMe ? "sent" : "received"}">`];
  if (message.senderHtml !== null) {
    lines.push(`      <span class="sender">${message.senderHtml}</span>`);
  }
  lines.push(
    `      ${message.bodyHtml}`,
    `      <span class="metadata"><span class="time">${escapeHtml(message.time)}</span></span>`,
    "    </div>",
  );
  return lines;
}

export function renderDivider(label: string): string {
  return `    <div class="date-divider"><span>${escapeHtml(label)}</span></div>`;
}

/** Control is inert (disabled and muted) when there is nothing to reveal. */
export function renderDisclosure(direction: Direction, slug: string, available: boolean): string {
  const target = escapeHtml(panelId(direction, slug));
  const classes = available ? `disclosure ${direction}` : `disclosure ${direction} inert`;
  const state = available ? "" : " disabled";
  return `    <button type="button" class="${classes}" data-reveal="${target}"${state}>${DISCLOSURE_TEXT[direction]}</button>`;
}

function renderPanel(
  direction: Direction,
  slug: string,
  label: string,
  messages: MessageView[],
): string[] {
  return [
    `    <div class="day-panel ${direction}" id="${escapeHtml(panelId(direction, slug))}" hidden>`,
    renderDivider(label),
    ...messages.flatMap(renderMessage),
    "    </div>",
  ];
}

export function renderConversation(view: ConversationView, labels: DayLabels): string[] {
  return [
    `<div class="conversation_group" id="conversation-${escapeHtml(view.slug)}">`,
    '  <div class="conversation-header">',
    renderDisclosure("prev", view.slug, view.prev.length > 0),
    `    <h2>${escapeHtml(view.contactName)}</h2>`,
    renderDisclosure("next", view.slug, view.next.length > 0),
    "  </div>",
    '  <div class="conversation-container">',
    ...renderPanel("prev", view.slug, labels.prev, view.prev),
    renderDivider(labels.current),
    ...view.current.flatMap(renderMessage),
    ...renderPanel("next", view.slug, labels.next, view.next),
    "  </div>",
    "</div>",
  ];
}
