import fs from "fs";
import os from "os";
import path from "path";
import { afterEach } from "vitest";

const created: string[] = [];

/** Temporary directory removed after each test. */
export function useTempDir(): () => string {
  afterEach(() => {
    while (created.length) {
      const dir = created.pop();
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
    }
  });
  return () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chatlog-viewer-"));
    created.push(dir);
    return dir;
  };
}

export function writeJson(filePath: string, value: unknown): string {
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2), "utf-8");
  return filePath;
}

export function textMessage(
  timestamp: string,
  text: string,
  extra: { fromMe?: boolean; remoteResourceDisplayName?: string } = {},
) {
  return { type: "text", timestamp, text, ...extra };
}

/** A small export: one direct chat, one group chat, one nameless chat. */
export function sampleExport() {
  return {
    chats: [
      {
        contactName: "Jane Doe",
        key: "15550001111@s.whatsapp.net",
        messages: [
          textMessage("2025-01-30T15:00:00Z", "morning!"),
          textMessage("2025-01-30T15:02:00Z", "hey Jane", { fromMe: true }),
          { type: "image", timestamp: "2025-01-30T15:03:00Z" },
          { type: "text", text: "no timestamp here" },
        ],
      },
      {
        contactName: "Book Club",
        key: "120363000000000000@g.us",
        messages: [
          textMessage("2025-01-30T14:00:00Z", "chapter 3 tonight?", {
            remoteResourceDisplayName: "Carol Ann",
          }),
          textMessage("2025-01-31T07:00:00Z", "running late", {
            remoteResourceDisplayName: "15550002222@s.whatsapp.net",
          }),
        ],
      },
      {
        contactName: "",
        key: "15550003333@s.whatsapp.net",
        messages: [textMessage("2025-01-30T15:00:00Z", "dropped")],
      },
    ],
  };
}
