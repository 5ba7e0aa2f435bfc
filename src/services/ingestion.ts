import fs from "fs";
import path from "path";
import { describeIssues, exportChatSchema, exportDocumentSchema } from "../core/export-schema.js";
import { isGroupChatKey, mapExportMessage } from "../core/mappers.js";
import { AppError, ErrorKind, errorMessage, isAppError } from "../errors.js";
import { MessageStore, type NewStoredMessage, type StoreStats } from "../storage/message-store.js";
import { log } from "../utils/logger.js";

export interface NormalizedExport {
  messages: NewStoredMessage[];
  chats: number;
  skipped: number;
  ignored: number;
}

export interface ConvertOptions {
  /** Asked only when the target store already exists. */
  confirmOverwrite: (storePath: string) => Promise<boolean>;
}

export type ConvertResult =
  | { status: "cancelled"; storePath: string }
  | {
      status: "converted";
      storePath: string;
      inserted: number;
      chats: number;
      skipped: number;
      ignored: number;
      overwritten: boolean;
      firstTimestamp: string | null;
      lastTimestamp: string | null;
    };

export function storePathFor(exportPath: string): string {
  const absolute = path.resolve(exportPath);
  const { dir, name, ext } = path.parse(absolute);
  if (ext.toLowerCase() === ".db") {
    throw new AppError(
      ErrorKind.USER_INPUT,
      `Refusing to convert '${exportPath}': the store would replace the input file.`,
    );
  }
  return path.join(dir, `${name}.db`);
}

export function readExportFile(exportPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(exportPath, "utf-8");
  } catch (error) {
    throw new AppError(ErrorKind.USER_INPUT, `The file '${exportPath}' could not be read.`, {
      cause: error,
    });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new AppError(
      ErrorKind.USER_INPUT,
      `Could not decode JSON from the file '${exportPath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Turns a parsed export into store records. Chats without a contact name are
 * dropped; a malformed text message is logged and skipped.
 */
export function normalizeExport(document: unknown, source = "export"): NormalizedExport {
  const parsed = exportDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new AppError(
      ErrorKind.USER_INPUT,
      `'${source}' is not a chat export: ${describeIssues(parsed.error)}`,
    );
  }

  const result: NormalizedExport = { messages: [], chats: 0, skipped: 0, ignored: 0 };

  parsed.data.chats.forEach((rawChat, chatIndex) => {
    const chat = exportChatSchema.safeParse(rawChat);
    if (!chat.success) {
      log.warn({ chatIndex, issues: describeIssues(chat.error) }, "Skipping malformed chat");
      return;
    }

    const contactName = chat.data.contactName;
    if (!contactName) {
      log.debug({ chatIndex }, "Skipping chat without a contact name");
      return;
    }

    result.chats += 1;
    const context = { contactName, isGroupChat: isGroupChatKey(chat.data.key) };

    chat.data.messages.forEach((rawMessage, messageIndex) => {
      try {
        const mapped = mapExportMessage(rawMessage, context);
        if (mapped.kind === "text") {
          result.messages.push(mapped.record);
        } else {
          result.ignored += 1;
        }
      } catch (error) {
        if (!isAppError(error) || error.kind !== ErrorKind.DATA) throw error;
        result.skipped += 1;
        log.warn(
          { contactName, messageIndex, reason: error.message },
          "Skipping a message due to missing data",
        );
      }
    });
  });

  return result;
}

function removeStore(storePath: string): void {
  try {
    fs.rmSync(storePath, { force: true });
  } catch (error) {
    throw new AppError(
      ErrorKind.ENVIRONMENT,
      `Could not remove existing database file '${storePath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Converts an export into a sibling `.db` store. The export is read and
 * validated before the user is asked about an existing store, so a bad
 * input never costs the old one.
 */
export async function convertExport(
  exportPath: string,
  options: ConvertOptions,
): Promise<ConvertResult> {
  const storePath = storePathFor(exportPath);

  if (!fs.existsSync(exportPath)) {
    throw new AppError(ErrorKind.USER_INPUT, `The file '${exportPath}' was not found.`);
  }

  log.info({ exportPath }, "Loading chat export");
  const normalized = normalizeExport(readExportFile(exportPath), exportPath);
  log.info(
    {
      chats: normalized.chats,
      messages: normalized.messages.length,
      skipped: normalized.skipped,
      ignored: normalized.ignored,
    },
    "Chat export loaded",
  );

  const exists = fs.existsSync(storePath);
  if (exists) {
    const accepted = await options.confirmOverwrite(storePath);
    if (!accepted) {
      log.info({ storePath }, "Conversion cancelled by user");
      return { status: "cancelled", storePath };
    }
    log.info({ storePath }, "Overwriting existing database");
    removeStore(storePath);
  }

  let store: MessageStore;
  try {
    store = new MessageStore(storePath);
  } catch (error) {
    throw new AppError(
      ErrorKind.ENVIRONMENT,
      `Could not create database '${storePath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }

  let inserted: number;
  let stats: StoreStats;
  try {
    inserted = store.insertMessages(normalized.messages);
    stats = store.stats();
  } catch (error) {
    throw new AppError(
      ErrorKind.ENVIRONMENT,
      `Could not write messages to '${storePath}': ${errorMessage(error)}`,
      { cause: error },
    );
  } finally {
    store.close();
  }

  log.info(
    {
      storePath,
      inserted,
      contacts: stats.contacts,
      firstTimestamp: stats.firstTimestamp,
      lastTimestamp: stats.lastTimestamp,
    },
    "Conversion complete",
  );
  return {
    status: "converted",
    storePath,
    inserted,
    chats: normalized.chats,
    skipped: normalized.skipped,
    ignored: normalized.ignored,
    overwritten: exists,
    firstTimestamp: stats.firstTimestamp,
    lastTimestamp: stats.lastTimestamp,
  };
}
