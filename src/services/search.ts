import fs from "fs";
import path from "path";
import { mapStoredMessage } from "../core/mappers.js";
import type { ChatMessage } from "../core/types.js";
import { AppError, ErrorKind, errorMessage, isAppError } from "../errors.js";
import { toConversationView } from "../render/message-view.js";
import { renderReport, reportFileName } from "../render/report.js";
import { MessageStore } from "../storage/message-store.js";
import type { ReportOpener } from "../utils/browser.js";
import { log } from "../utils/logger.js";
import { formatIsoDate, parseCalendarDate } from "../utils/timezone.js";
import { assembleConversations } from "./conversation-assembler.js";
import { describeWindows, resolveDayWindows, windowSpan, type DayWindows } from "./day-windows.js";

export interface SearchOptions {
  timeZone: string;
  outputDir: string;
  /** Called after the report is written; failures only warn. */
  openReport?: ReportOpener;
}

export type SearchResult =
  | { status: "empty"; date: string }
  | {
      status: "written";
      date: string;
      outputPath: string;
      conversations: number;
      messages: number;
      opened: boolean;
    };

export function loadWindowMessages(storePath: string, windows: DayWindows): ChatMessage[] {
  let store: MessageStore;
  try {
    store = new MessageStore(storePath, { readonly: true });
  } catch (error) {
    if (isAppError(error)) throw error;
    throw new AppError(
      ErrorKind.USER_INPUT,
      `Could not open database '${storePath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }

  try {
    const span = windowSpan(windows);
    return store.listMessagesBetween(span.startMs, span.endMs).map(mapStoredMessage);
  } finally {
    store.close();
  }
}

function writeReport(outputPath: string, html: string): void {
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, html, "utf-8");
  } catch (error) {
    throw new AppError(
      ErrorKind.ENVIRONMENT,
      `Could not write to file '${outputPath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Renders the conversations active on `dateArg` (a local calendar day in
 * `options.timeZone`) with the neighbouring days as collapsed context.
 */
export async function searchChatsByDate(
  storePath: string,
  dateArg: string,
  options: SearchOptions,
): Promise<SearchResult> {
  if (!fs.existsSync(storePath)) {
    throw new AppError(ErrorKind.USER_INPUT, `Database file '${storePath}' not found.`);
  }

  const date = parseCalendarDate(dateArg);
  const isoDate = formatIsoDate(date);
  const windows = resolveDayWindows(date, options.timeZone);
  log.debug(describeWindows(windows), "Resolved day windows");

  const messages = loadWindowMessages(storePath, windows);
  const conversations = assembleConversations(messages, windows);
  if (conversations.length === 0) {
    log.info({ date: isoDate, scanned: messages.length }, "No messages on target date");
    return { status: "empty", date: isoDate };
  }

  const views = conversations.map((conversation) =>
    toConversationView(conversation, windows.timeZone),
  );
  const outputPath = path.resolve(options.outputDir, reportFileName(storePath, date));
  writeReport(outputPath, renderReport(views, windows));
  log.info({ outputPath, conversations: views.length }, "Report written");

  let opened = false;
  if (options.openReport) {
    try {
      await options.openReport(outputPath);
      opened = true;
    } catch (error) {
      log.warn({ err: error, outputPath }, "Could not open browser");
    }
  }

  return {
    status: "written",
    date: isoDate,
    outputPath,
    conversations: conversations.length,
    messages: conversations.reduce(
      (total, conversation) =>
        total + conversation.prev.length + conversation.current.length + conversation.next.length,
      0,
    ),
    opened,
  };
}
