#!/usr/bin/env node
/**
 * Command line driver for the Wisp compiler.
 *
 * Usage:
 *   wispc <command> <input-file>... [options]
 *
 * Commands:
 *   build       Compile to JavaScript
 *   check       Run compile-time evaluation and type checking only
 *   mir         Print the MIR of every function
 *   comptime    Print the value of every compile-time call site
 */

import * as fs from "fs";
import * as path from "path";
import { Decision } from "./comptime/capability";
import { formatValue } from "./comptime/value";
import { ConfigError, SessionConfig, isEffect, isMode } from "./config";
import { CompileErrors } from "./diagnostics/errors";
import { formatErrors, formatSpan } from "./diagnostics/format";
import { CompileFailure, SourceFile, compile } from "./driver/driver";
import { printFunction } from "./mir/print";

type Command = "build" | "check" | "mir" | "comptime";

const COMMANDS: readonly Command[] = ["build", "check", "mir", "comptime"];

interface CliOptions {
  command: Command;
  inputFiles: string[];
  outputFile: string | null;
  verbose: boolean;
  config: Partial<SessionConfig>;
}

function printHelp(): void {
  console.log(`
wispc - Wisp compiler

Usage:
  wispc <command> <input-file>... [options]

Commands:
  build                  Compile to JavaScript
  check                  Evaluate compile-time code and type check only
  mir                    Print the MIR of every function
  comptime               Print the value of every compile-time call site

Options:
  -o, --output <file>    Output file path (default: stdout)
  --sandbox              Use the lsp-sandbox capability table
  --mode <mode>          build or lsp-sandbox
  --max-steps <n>        Interpreter steps per evaluation
  --time-budget <ms>     Wall-clock budget per evaluation
  --max-passes <n>       Code insertion passes before giving up
  --workers <n>          Concurrent evaluations per wave
  --cache-dir <dir>      Persist the compile-time cache in <dir>
  --allow <effect>       Execute an effect (read, write, network, shell)
  --noop <effect>        Pretend an effect succeeded
  --deny <effect>        Refuse an effect
  -v, --verbose          Log phases and cache activity to stderr
  -h, --help             Show this help

Examples:
  wispc build main.wisp -o main.js
  wispc check main.wisp --sandbox
  wispc comptime gen.wisp --allow read --max-steps 50000
`);
}

function parseArgs(args: string[]): CliOptions | null {
  const [command, ...rest] = args;
  if (!COMMANDS.some((c) => c === command)) {
    console.error(`Error: Unknown command: ${command}`);
    return null;
  }
  const options: CliOptions = {
    command: command === "check" || command === "mir" || command === "comptime" ? command : "build",
    inputFiles: [],
    outputFile: null,
    verbose: false,
    config: {},
  };
  const policy = new Map<string, Decision>();

  let i = 0;
  const value = (flag: string): string | null => {
    i++;
    if (i >= rest.length) {
      console.error(`Error: ${flag} requires a value`);
      return null;
    }
    return rest[i];
  };
  const integer = (flag: string): number | null => {
    const text = value(flag);
    if (text === null) return null;
    const n = Number(text);
    if (!Number.isInteger(n)) {
      console.error(`Error: ${flag} expects an integer, got '${text}'`);
      return null;
    }
    return n;
  };

  while (i < rest.length) {
    const arg = rest[i];

    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    } else if (arg === "-o" || arg === "--output") {
      const file = value(arg);
      if (file === null) return null;
      options.outputFile = file;
    } else if (arg === "-v" || arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--sandbox") {
      options.config.mode = "lsp-sandbox";
    } else if (arg === "--mode") {
      const mode = value(arg);
      if (mode === null) return null;
      if (!isMode(mode)) {
        console.error(`Error: Unknown mode: ${mode}`);
        return null;
      }
      options.config.mode = mode;
    } else if (arg === "--max-steps" || arg === "--time-budget" || arg === "--max-passes" || arg === "--workers") {
      const n = integer(arg);
      if (n === null) return null;
      if (arg === "--max-steps") options.config.maxSteps = n;
      else if (arg === "--time-budget") options.config.timeBudgetMs = n;
      else if (arg === "--max-passes") options.config.maxInsertionPasses = n;
      else options.config.workers = n;
    } else if (arg === "--cache-dir") {
      const dir = value(arg);
      if (dir === null) return null;
      options.config.cacheDir = dir;
    } else if (arg === "--allow" || arg === "--noop" || arg === "--deny") {
      const effect = value(arg);
      if (effect === null) return null;
      policy.set(effectName(effect), arg === "--allow" ? "Execute" : arg === "--noop" ? "NoOpSucceed" : "Deny");
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      options.inputFiles.push(arg);
    }
    i++;
  }

  for (const [effect, decision] of policy) {
    if (!isEffect(effect)) {
      console.error(`Error: Unknown effect: ${effect.toLowerCase()}`);
      return null;
    }
    options.config.policy = { ...options.config.policy, [effect]: decision };
  }

  if (options.inputFiles.length === 0) {
    console.error("Error: No input file specified");
    printHelp();
    return null;
  }

  return options;
}

/** `network` -> `Network` */
function effectName(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function readSources(files: string[]): SourceFile[] {
  return files.map((file) => {
    const inputPath = path.resolve(file);
    try {
      return { file, text: fs.readFileSync(inputPath, "utf-8") };
    } catch (err) {
      console.error(`Error reading file: ${inputPath}`);
      if (err instanceof Error) {
        console.error(err.message);
      }
      process.exit(1);
    }
  });
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(1);
  }
  if (args[0] === "-h" || args[0] === "--help") {
    printHelp();
    process.exit(0);
  }

  const options = parseArgs(args);
  if (!options) {
    process.exit(1);
  }

  const sources = readSources(options.inputFiles);
  const log = options.verbose ? (message: string) => console.error(message) : undefined;

  let output = "";
  try {
    const result = await compile(sources, options.config, {
      log,
      stopAfter: options.command === "build" ? undefined : "typecheck",
    });
    switch (options.command) {
      case "build":
        output = result.code ?? "";
        break;
      case "check":
        console.error(`ok: ${result.program.functions.size} function(s), ${result.siteValues.size} compile-time value(s)`);
        break;
      case "mir":
        output =
          [...result.program.functions.values()]
            .sort((a, b) => a.id.localeCompare(b.id))
            .map((fn) => printFunction(fn))
            .join("\n\n") + "\n";
        break;
      case "comptime":
        output = [...result.program.sites.values()]
          .sort((a, b) => a.order - b.order)
          .map((site) => {
            const value = result.siteValues.get(site.id);
            const shown = value ? formatValue(value) : "<not evaluated>";
            return `${site.id} ${formatSpan(site.span, result.sources)} = ${shown}\n`;
          })
          .join("");
        break;
    }
  } catch (err) {
    if (err instanceof CompileFailure) {
      console.error(formatErrors(err, err.sources));
    } else if (err instanceof CompileErrors || err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
    } else {
      throw err;
    }
    process.exit(1);
  }

  if (options.outputFile) {
    const outputPath = path.resolve(options.outputFile);
    try {
      fs.writeFileSync(outputPath, output);
      console.error(`Compiled ${options.inputFiles.join(", ")} -> ${options.outputFile}`);
    } catch (err) {
      console.error(`Error writing file: ${outputPath}`);
      if (err instanceof Error) {
        console.error(err.message);
      }
      process.exit(1);
    }
  } else {
    process.stdout.write(output);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
