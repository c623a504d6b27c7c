// packages/structural-cli/commands/generate.ts
// Write companion modules for every annotated declaration

import { relative } from "node:path";
import { generateProject } from "../../structural-type-compiler/src/compiler.ts";
import { printDiagnostics } from "../../structural-type-compiler/src/diag.ts";
import { type CliArgs, DEFAULT_SRC_DIR, loadConfig, requireDirectory } from "./shared.ts";

export async function generateCommand(args: CliArgs): Promise<number> {
  const srcDir = requireDirectory(args.positionals[1] ?? DEFAULT_SRC_DIR);
  const config = loadConfig(args);

  const { written, diagnostics } = await generateProject({ srcDir, config });
  if (diagnostics.length > 0) {
    return printDiagnostics("Derivation", diagnostics);
  }

  if (args.verbose) {
    for (const file of written) {
      console.log(`  wrote ${relative(process.cwd(), file)}`);
    }
  }
  console.log(`Generated ${written.length} companion module(s)`);
  return 0;
}
