import { spawn } from "child_process";
import { pathToFileURL } from "url";

export type ReportOpener = (filePath: string) => Promise<void>;

function openerCommand(url: string): { command: string; args: string[] } {
  if (process.platform === "darwin") {
    return { command: "open", args: [url] };
  }
  if (process.platform === "win32") {
    return { command: "cmd", args: ["/c", "start", "", url] };
  }
  return { command: "xdg-open", args: [url] };
}

/** Hands the file to the platform opener without waiting for the browser. */
export const openInBrowser: ReportOpener = (filePath) =>
  new Promise<void>((resolve, reject) => {
    const { command, args } = openerCommand(pathToFileURL(filePath).href);
    const child = spawn(command, args, { detached: true, stdio: "ignore" });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
