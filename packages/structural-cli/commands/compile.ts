// packages/structural-cli/commands/compile.ts
// Emit JavaScript with descriptors injected into their declaring modules

import { relative } from "node:path";
import { compileProject } from "../../structural-type-compiler/src/compiler.ts";
import { printDiagnostics } from "../../structural-type-compiler/src/diag.ts";
import { type CliArgs, loadConfig, requireDirectory, UsageError } from "./shared.ts";

export async function compileCommand(args: CliArgs): Promise<number> {
  const srcDir = args.positionals[1];
  if (!srcDir || !args.outDir) {
    throw new UsageError("Usage: structural compile <srcDir> --outDir <dir>");
  }
  requireDirectory(srcDir);
  const config = loadConfig(args);

  const { emitted, diagnostics } = await compileProject({
    srcDir,
    outDir: args.outDir,
    config,
  });
  if (diagnostics.length > 0) {
    return printDiagnostics("Compile", diagnostics);
  }

  if (args.verbose) {
    for (const file of emitted) {
      console.log(`  emitted ${relative(process.cwd(), file)}`);
    }
  }
  console.log(`Compiled ${emitted.length} file(s) into ${args.outDir}`);
  return 0;
}
