import fs from "fs";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { ErrorKind } from "../errors.js";
import { MessageStore, type NewStoredMessage } from "../storage/message-store.js";
import { useTempDir } from "../test/fixtures.js";
import { searchChatsByDate } from "./search.js";

const tempDir = useTempDir();
const TZ = "America/Chicago";

function row(contact: string, timestamp: string, text: string, fromMe = false): NewStoredMessage {
  return {
    contact_name: contact,
    timestamp,
    timestamp_ms: Date.parse(timestamp),
    from_me: fromMe ? 1 : 0,
    sender_name: fromMe ? "Me" : contact,
    text,
  };
}

function seedStore(dir: string, rows: NewStoredMessage[]): string {
  const storePath = path.join(dir, "ChatLog.db");
  const store = new MessageStore(storePath);
  store.insertMessages(rows);
  store.close();
  return storePath;
}

describe("searchChatsByDate", () => {
  it("writes the report next to the output directory and opens it", async () => {
    const dir = tempDir();
    const storePath = seedStore(dir, [
      row("Alice", "2025-01-30T15:00:00Z", "morning"),
      row("Alice", "2025-01-29T20:00:00Z", "yesterday"),
      row("Bob", "2025-01-30T14:00:00Z", "earlier", true),
      row("Bob", "2025-01-31T18:00:00Z", "tomorrow"),
    ]);
    const openReport = vi.fn(async () => undefined);

    const result = await searchChatsByDate(storePath, "2025-01-30", {
      timeZone: TZ,
      outputDir: dir,
      openReport,
    });

    const outputPath = path.join(dir, "ChatLog_2025-01-30.html");
    expect(result).toEqual({
      status: "written",
      date: "2025-01-30",
      outputPath,
      conversations: 2,
      messages: 4,
      opened: true,
    });
    expect(openReport).toHaveBeenCalledWith(outputPath);

    const html = fs.readFileSync(outputPath, "utf-8");
    expect(html.indexOf("<h2>Bob</h2>")).toBeLessThan(html.indexOf("<h2>Alice</h2>"));
    expect(html).toContain('<div class="day-panel prev" id="prev-Alice" hidden>');
  });

  it("reports an empty day without writing a file", async () => {
    const dir = tempDir();
    const storePath = seedStore(dir, [row("Alice", "2025-01-29T20:00:00Z", "yesterday")]);
    const outputDir = path.join(dir, "reports");
    const openReport = vi.fn(async () => undefined);

    const result = await searchChatsByDate(storePath, "2025-01-30", { timeZone: TZ, outputDir, openReport });

    expect(result).toEqual({ status: "empty", date: "2025-01-30" });
    expect(fs.existsSync(outputDir)).toBe(false);
    expect(openReport).not.toHaveBeenCalled();
  });

  it("assigns local midnight across a DST change to the day it starts", async () => {
    const dir = tempDir();
    // 00:00 CDT on 2025-03-10
    const storePath = seedStore(dir, [row("Alice", "2025-03-10T05:00:00Z", "midnight")]);

    const before = await searchChatsByDate(storePath, "2025-03-09", { timeZone: TZ, outputDir: dir });
    const on = await searchChatsByDate(storePath, "2025-03-10", { timeZone: TZ, outputDir: dir });

    expect(before.status).toBe("empty");
    expect(on).toMatchObject({ status: "written", conversations: 1 });
  });

  it("windows by the timezone it is given", async () => {
    const dir = tempDir();
    const storePath = seedStore(dir, [row("Alice", "2025-01-30T20:00:00Z", "evening in Kolkata")]);

    const kolkata = await searchChatsByDate(storePath, "2025-01-31", {
      timeZone: "Asia/Kolkata",
      outputDir: dir,
    });
    const chicago = await searchChatsByDate(storePath, "2025-01-31", { timeZone: TZ, outputDir: dir });

    expect(kolkata.status).toBe("written");
    expect(chicago.status).toBe("empty");
  });

  it("only warns when the browser cannot be opened", async () => {
    const dir = tempDir();
    const storePath = seedStore(dir, [row("Alice", "2025-01-30T15:00:00Z", "morning")]);

    const result = await searchChatsByDate(storePath, "2025-01-30", {
      timeZone: TZ,
      outputDir: dir,
      openReport: async () => {
        throw new Error("no display");
      },
    });

    expect(result).toMatchObject({ status: "written", opened: false });
    expect(fs.existsSync(path.join(dir, "ChatLog_2025-01-30.html"))).toBe(true);
  });

  it("classifies bad input and configuration", async () => {
    const dir = tempDir();
    const storePath = seedStore(dir, []);

    await expect(
      searchChatsByDate(path.join(dir, "nope.db"), "2025-01-30", { timeZone: TZ, outputDir: dir }),
    ).rejects.toMatchObject({ kind: ErrorKind.USER_INPUT });
    await expect(
      searchChatsByDate(storePath, "30/01/2025", { timeZone: TZ, outputDir: dir }),
    ).rejects.toMatchObject({ kind: ErrorKind.USER_INPUT });
    await expect(
      searchChatsByDate(storePath, "2025-01-30", { timeZone: "Not/AZone", outputDir: dir }),
    ).rejects.toMatchObject({ kind: ErrorKind.ENVIRONMENT });
  });

  it("rejects a file that is not a store", async () => {
    const dir = tempDir();
    const bogus = path.join(dir, "notes.db");
    fs.writeFileSync(bogus, "just some text, definitely not sqlite");

    await expect(
      searchChatsByDate(bogus, "2025-01-30", { timeZone: TZ, outputDir: dir }),
    ).rejects.toMatchObject({ kind: ErrorKind.USER_INPUT });
  });
});
