#!/usr/bin/env node
import { promises as fs } from "fs";
import * as path from "path";
import { parseArgs } from "util";
import { COMMANDS, type CommandFlags, type CommandIO, USAGE, resolveCommand } from "./commands";
import { loadConfig } from "./config";
import { AppContext } from "./context";
import { isHourbookError } from "./errors";
import { createLogger, type LogSink } from "./logger";

const FLAG_OPTIONS = {
  name: { type: "string" },
  email: { type: "string" },
  phone: { type: "string" },
  address: { type: "string" },
  customer: { type: "string" },
  department: { type: "string" },
  description: { type: "string" },
  date: { type: "string" },
  hours: { type: "string" },
  from: { type: "string" },
  to: { type: "string" },
  task: { type: "string" },
  start: { type: "string" },
  end: { type: "string" },
  out: { type: "string" },
  "data-dir": { type: "string" },
} as const;

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
  clock?: () => Date;
  logSink?: LogSink;
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  let positionals: string[];
  let flags: CommandFlags;
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        ...FLAG_OPTIONS,
        help: { type: "boolean", short: "h" },
      },
    });
    if (parsed.values.help === true) {
      out(USAGE);
      return 0;
    }
    positionals = parsed.positionals;
    flags = {};
    for (const [name, value] of Object.entries(parsed.values)) {
      if (typeof value === "string") {
        flags[name] = value;
      }
    }
  } catch (error) {
    err(error instanceof Error ? error.message : String(error));
    err(USAGE);
    return 2;
  }

  const resolved = resolveCommand({ positionals, flags });
  if (!resolved) {
    const known = Array.from(COMMANDS.keys()).join(", ");
    err(
      positionals.length > 0
        ? `Unknown command: ${positionals.slice(0, 2).join(" ")} (groups: ${known})`
        : USAGE
    );
    return 2;
  }

  let context: AppContext | undefined;
  try {
    const config = loadConfig(options.env ?? process.env, {
      dataDir: flags["data-dir"],
    });
    const logger = createLogger({ level: config.logLevel, sink: options.logSink });
    const io: CommandIO = {
      out,
      async writeFile(file, content) {
        await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
        await fs.writeFile(file, content, "utf8");
      },
    };

    if (resolved.kind === "standalone") {
      await resolved.handler({ config, logger, clock: options.clock }, resolved.input, io);
      return 0;
    }
    context = await AppContext.open(config, { logger, clock: options.clock });
    await resolved.handler(context, resolved.input, io);
    return 0;
  } catch (error) {
    if (isHourbookError(error)) {
      err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    context?.dispose();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("hourbook: unexpected failure", error);
      process.exitCode = 1;
    }
  );
}
