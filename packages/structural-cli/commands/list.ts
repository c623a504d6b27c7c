// packages/structural-cli/commands/list.ts
// List annotated declarations grouped by directory

import { basename, dirname, relative } from "node:path";
import {
  type DeclarationInfo,
  listDeclarations,
} from "../../structural-type-compiler/src/compiler.ts";
import { type CliArgs, DEFAULT_SRC_DIR, loadConfig, requireDirectory } from "./shared.ts";

export async function listCommand(args: CliArgs): Promise<number> {
  const srcDir = requireDirectory(args.positionals[1] ?? DEFAULT_SRC_DIR);
  const config = loadConfig(args);
  const cwd = process.cwd();

  console.log(`Scanning for @${config.tag} declarations...\n`);
  const infos = await listDeclarations({ srcDir, config });

  if (infos.length === 0) {
    console.log(`No @${config.tag} declarations found.`);
    console.log(`\nTip: tag an interface or type alias with /** @${config.tag} */`);
    return 0;
  }

  // Group by directory, then by file
  const directories = new Map<string, Map<string, DeclarationInfo[]>>();
  for (const info of infos) {
    const relPath = relative(cwd, info.file);
    const dir = dirname(relPath);
    const files = directories.get(dir) ?? new Map<string, DeclarationInfo[]>();
    directories.set(dir, files);
    const entries = files.get(basename(relPath)) ?? [];
    files.set(basename(relPath), [...entries, info]);
  }

  for (const dir of [...directories.keys()].sort()) {
    console.log(`${dir}/`);
    for (const [fileName, entries] of directories.get(dir) ?? []) {
      console.log(`  ${fileName}:`);
      for (const info of entries) {
        console.log(`    - ${formatEntry(info, args.verbose)}`);
      }
    }
    console.log();
  }

  const failed = infos.filter((i) => i.kind === "error").length;
  const fileCount = new Set(infos.map((i) => i.file)).size;
  console.log(`Found ${infos.length} declaration(s) in ${fileCount} file(s)`);
  if (failed > 0) {
    console.log(`${failed} declaration(s) cannot be derived`);
  }
  return failed > 0 ? 1 : 0;
}

export function formatEntry(info: DeclarationInfo, verbose: boolean): string {
  if (info.kind === "error") {
    return `${info.name} (${info.message})`;
  }
  if (!verbose) return `${info.name}$`;
  const members = info.members.length ? `: ${info.members.join(", ")}` : "";
  return `${info.name}$ (${info.kind}${members})`;
}
