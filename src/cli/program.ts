import fs from "fs";
import path from "path";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { loadConfig } from "../config.js";
import { errorMessage, isAppError } from "../errors.js";
import { convertExport, type ConvertResult } from "../services/ingestion.js";
import { searchChatsByDate, type SearchResult } from "../services/search.js";
import { openInBrowser, type ReportOpener } from "../utils/browser.js";
import { log, setLogLevel } from "../utils/logger.js";
import { printError, println, processOutput, type Output } from "./output.js";
import { confirmOverwrite } from "./prompts.js";

export interface CliDeps {
  output: Output;
  confirmOverwrite: (storePath: string) => Promise<boolean>;
  openReport: ReportOpener;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

type CliOptions = {
  convert?: string;
  yes: boolean;
  timezone?: string;
  outputDir?: string;
  open: boolean;
  verbose: boolean;
  quiet: boolean;
};

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw = fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
    return packageSchema.parse(JSON.parse(raw)).version;
  } catch (error) {
    log.debug({ err: error }, "Could not read package version");
    return "0.0.0";
  }
}

export function defaultDeps(): CliDeps {
  return {
    output: processOutput,
    confirmOverwrite,
    openReport: openInBrowser,
    env: process.env,
    cwd: process.cwd(),
  };
}

export function buildProgram(output: Output): Command {
  return new Command()
    .name("chatlog-viewer")
    .description("Convert and search exported WhatsApp chat logs.")
    .version(readVersion())
    .argument("[store]", "the database file to search")
    .argument("[date]", "the date to search for (YYYY-MM-DD)")
    .option("-c, --convert <export.json>", "convert the specified JSON export to a SQLite store")
    .option("-y, --yes", "overwrite an existing store without asking", false)
    .option("-t, --timezone <zone>", "IANA timezone for day boundaries and times (default: $CHAT_TIMEZONE)")
    .option("-o, --output-dir <dir>", "directory for the HTML report (default: $CHAT_OUTPUT_DIR or cwd)")
    .option("--no-open", "do not open the report in a browser")
    .option("-v, --verbose", "enable debug logging", false)
    .option("-q, --quiet", "only log errors", false)
    .addHelpText(
      "after",
      [
        "",
        "Examples:",
        "  chatlog-viewer --convert ChatLog.json",
        "  chatlog-viewer ChatLog.db 2025-01-30",
      ].join("\n"),
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.stdout(text),
      writeErr: (text) => output.stderr(text),
    });
}

function reportConversion(output: Output, result: ConvertResult): void {
  if (result.status === "cancelled") {
    println(output, "Conversion cancelled by user.");
    return;
  }
  println(output, "Conversion complete.");
  println(
    output,
    `Successfully inserted ${result.inserted} text messages into '${result.storePath}'.`,
  );
  if (result.skipped > 0) {
    println(output, `Skipped ${result.skipped} malformed message(s); see the log for details.`);
  }
}

function reportSearch(output: Output, result: SearchResult): void {
  if (result.status === "empty") {
    println(output, `No messages found for ${result.date}`);
    return;
  }
  println(output, `Successfully wrote chat log to '${result.outputPath}'`);
  if (result.opened) {
    println(output, "Opening report in your default browser...");
  }
}

async function runCommand(
  program: Command,
  store: string | undefined,
  date: string | undefined,
  deps: CliDeps,
): Promise<void> {
  const options = program.opts<CliOptions>();
  const config = loadConfig(deps.env, deps.cwd);
  setLogLevel(options.quiet ? "error" : options.verbose ? "debug" : config.logLevel);

  if (options.convert) {
    const result = await convertExport(path.resolve(deps.cwd, options.convert), {
      confirmOverwrite: options.yes ? async () => true : deps.confirmOverwrite,
    });
    reportConversion(deps.output, result);
    return;
  }

  if (store && date) {
    const result = await searchChatsByDate(path.resolve(deps.cwd, store), date, {
      timeZone: options.timezone ?? config.timeZone,
      outputDir: options.outputDir ? path.resolve(deps.cwd, options.outputDir) : config.outputDir,
      openReport: options.open && config.openBrowser ? deps.openReport : undefined,
    });
    reportSearch(deps.output, result);
    return;
  }

  program.outputHelp();
}

/** Runs one invocation and resolves to the process exit code; never rejects. */
export async function runCli(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const program = buildProgram(deps.output);
  program.action((store: string | undefined, date: string | undefined) =>
    runCommand(program, store, date, deps),
  );

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isAppError(error)) {
      log.debug({ err: error, kind: error.kind, details: error.details }, "Command failed");
      printError(deps.output, `Error: ${error.message}`);
      return 1;
    }
    log.error({ err: error }, "Unexpected error");
    printError(deps.output, `Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
}
