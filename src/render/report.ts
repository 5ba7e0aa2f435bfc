import path from "path";
import type { DayWindows } from "../services/day-windows.js";
import { addDays, formatIsoDate, formatLongDate, type CalendarDate } from "../utils/timezone.js";
import { escapeHtml } from "./escape.js";
import { renderConversation, type DayLabels } from "./fragments.js";
import type { ConversationView } from "./message-view.js";
import { renderDocument } from "./template.js";

export function dayLabels(date: CalendarDate): DayLabels {
  return {
    prev: formatLongDate(addDays(date, -1)),
    current: formatLongDate(date),
    next: formatLongDate(addDays(date, 1)),
  };
}

export function reportTitle(date: CalendarDate): string {
  return `Chat Logs for ${formatLongDate(date)}`;
}

/** `<store-basename>_<YYYY-MM-DD>.html` */
export function reportFileName(storePath: string, date: CalendarDate): string {
  const baseName = path.parse(storePath).name;
  return `${baseName}_${formatIsoDate(date)}.html`;
}

export function renderReport(conversations: ConversationView[], windows: DayWindows): string {
  const labels = dayLabels(windows.date);
  return renderDocument({
    titleHtml: escapeHtml(reportTitle(windows.date)),
    bodyLines: conversations.flatMap((view) => renderConversation(view, labels)),
  });
}
