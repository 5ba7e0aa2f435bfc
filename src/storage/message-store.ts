import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { AppError, ErrorKind } from "../errors.js";
import { log } from "../utils/logger.js";

export interface StoredMessage {
  id: number;
  contact_name: string;
  timestamp: string;
  timestamp_ms: number;
  from_me: number;
  sender_name: string;
  text: string;
}

export type NewStoredMessage = Omit<StoredMessage, "id">;

export interface StoreStats {
  messages: number;
  contacts: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

export interface MessageStoreOptions {
  /** Open an existing store for reading only; no schema is created. */
  readonly?: boolean;
}

export class MessageStore {
  private db: Database.Database;

  constructor(dbPath: string, options: MessageStoreOptions = {}) {
    if (options.readonly) {
      this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
      this.assertSchema(dbPath);
      return;
    }

    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("encoding = 'UTF-8'");
    this.migrate();
  }

  private migrate(): void {
    const sql = `
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        contact_name TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        timestamp_ms INTEGER NOT NULL,
        from_me INTEGER NOT NULL,
        sender_name TEXT NOT NULL,
        text TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_ts ON messages(timestamp_ms);
    `;
    this.db.exec(sql);
  }

  private assertSchema(dbPath: string): void {
    let columns: string[];
    try {
      columns = this.db
        .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('messages')")
        .all()
        .map((column) => column.name);
    } catch (error) {
      this.close();
      throw error;
    }
    if (!columns.includes("timestamp_ms")) {
      this.close();
      throw new AppError(
        ErrorKind.USER_INPUT,
        `'${dbPath}' is not a chat store created by this tool (re-run the conversion).`,
        { details: { dbPath, columns } },
      );
    }
  }

  /** Inserts every record inside one transaction; nothing is written if any insert fails. */
  insertMessages(messages: readonly NewStoredMessage[]): number {
    const stmt = this.db.prepare<NewStoredMessage>(
      `INSERT INTO messages (contact_name, timestamp, timestamp_ms, from_me, sender_name, text)
       VALUES (@contact_name, @timestamp, @timestamp_ms, @from_me, @sender_name, @text)`,
    );
    const insertAll = this.db.transaction((rows: readonly NewStoredMessage[]) => {
      for (const row of rows) {
        stmt.run(row);
      }
      return rows.length;
    });
    return insertAll(messages);
  }

  /** Messages with `startMs <= timestamp_ms < endMs`, contact-major then chronological. */
  listMessagesBetween(startMs: number, endMs: number): StoredMessage[] {
    const stmt = this.db.prepare<[number, number], StoredMessage>(
      `SELECT id, contact_name, timestamp, timestamp_ms, from_me, sender_name, text
       FROM messages
       WHERE timestamp_ms >= ? AND timestamp_ms < ?
       ORDER BY contact_name, timestamp_ms, id`,
    );
    return stmt.all(startMs, endMs);
  }

  stats(): StoreStats {
    const row = this.db
      .prepare<
        [],
        { messages: number; contacts: number; first_ms: number | null; last_ms: number | null }
      >(
        `SELECT COUNT(*) AS messages,
                COUNT(DISTINCT contact_name) AS contacts,
                MIN(timestamp_ms) AS first_ms,
                MAX(timestamp_ms) AS last_ms
         FROM messages`,
      )
      .get();
    if (!row) {
      return { messages: 0, contacts: 0, firstTimestamp: null, lastTimestamp: null };
    }
    return {
      messages: row.messages,
      contacts: row.contacts,
      firstTimestamp: row.first_ms === null ? null : new Date(row.first_ms).toISOString(),
      lastTimestamp: row.last_ms === null ? null : new Date(row.last_ms).toISOString(),
    };
  }

  close(): void {
    try {
      this.db.close();
    } catch (error) {
      log.warn({ err: error }, "Failed to close message store");
    }
  }
}
