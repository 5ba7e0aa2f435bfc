import { confirm, isCancel } from "@clack/prompts";
import { log } from "../utils/logger.js";

/** Declines without asking when stdin is not a terminal; pass --yes to overwrite in scripts. */
export async function confirmOverwrite(storePath: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    log.warn({ storePath }, "Store exists and stdin is not interactive; use --yes to overwrite");
    return false;
  }
  const answer = await confirm({
    message: `Database file '${storePath}' already exists. Overwrite?`,
    initialValue: false,
  });
  return !isCancel(answer) && answer;
}
