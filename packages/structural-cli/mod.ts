#!/usr/bin/env -S npx tsx
// packages/structural-cli/mod.ts
// Structural Types Command Line Interface
//
// Usage:
//   npm run structural -- <command> [options]
//
// Commands:
//   generate [dir]                  Write companion modules next to sources
//   compile <srcDir> --outDir <dir> Emit JavaScript with injected descriptors
//   list [dir]                      List annotated declarations
//   help                            Show help

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { compileCommand } from "./commands/compile.ts";
import { generateCommand } from "./commands/generate.ts";
import { listCommand } from "./commands/list.ts";
import { type CliArgs, UsageError } from "./commands/shared.ts";

const COMMANDS = {
  "generate": generateCommand,
  "compile": compileCommand,
  "list": listCommand,
  "help": helpCommand,
} as const satisfies Record<string, (args: CliArgs) => Promise<number>>;

type CommandName = keyof typeof COMMANDS;

function isCommand(name: string): name is CommandName {
  return Object.hasOwn(COMMANDS, name);
}

/**
 * Run the CLI and resolve to the process exit code: 0 on success, 1 when
 * derivation fails or the command is unknown, 2 on a usage error.
 */
export async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        help: { type: "boolean", short: "h", default: false },
        verbose: { type: "boolean", short: "v", default: false },
        config: { type: "string" },
        outDir: { type: "string" },
      },
    });
    args = {
      positionals,
      help: values.help ?? false,
      verbose: values.verbose ?? false,
      config: values.config,
      outDir: values.outDir,
    };
  } catch (error) {
    if (!isParseArgsError(error)) throw error;
    console.error(`Error: ${error.message}\n`);
    await helpCommand();
    return 2;
  }

  const [command] = args.positionals;

  // Show help if no command or --help flag
  if (!command || args.help) {
    return helpCommand();
  }

  if (!isCommand(command)) {
    console.error(`Error: Unknown command "${command}"\n`);
    await helpCommand();
    return 1;
  }

  try {
    return await COMMANDS[command](args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      return 2;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error executing ${command}: ${message}`);
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
}

function isParseArgsError(error: unknown): error is TypeError & { code: string } {
  return error instanceof TypeError && "code" in error &&
    typeof error.code === "string" && error.code.startsWith("ERR_PARSE_ARGS");
}

function helpCommand(): Promise<number> {
  console.log(`
Structural Types CLI - derived canonical forms for TypeScript declarations

Usage:
  structural <command> [options]

Commands:
  generate [dir]                  Write <file>.structural.ts companions (default: src)
  compile <srcDir> --outDir <dir> Emit JavaScript with descriptors injected
  list [dir]                      List @structural declarations (default: src)
  help                            Show this help message

Options:
  --help, -h                      Show help
  --verbose, -v                   Show verbose output
  --config <path>                 Read configuration from <path>
                                  (default: ./structural.config.json)
  --outDir <dir>                  Output directory (for compile)

Examples:
  # Generate companions for src/
  structural generate

  # Compile src/ into dist/
  structural compile src --outDir dist

  # Show declarations with their members
  structural list src --verbose
`);
  return Promise.resolve(0);
}

// Run if this is the main module
if (process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
