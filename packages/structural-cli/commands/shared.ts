// packages/structural-cli/commands/shared.ts
import { existsSync, statSync } from "node:fs";
import {
  type StructuralConfig,
  readConfig,
} from "../../structural-type-compiler/src/config.ts";

export type CliArgs = {
  /** Command name first, then its positional arguments. */
  readonly positionals: readonly string[];
  readonly help: boolean;
  readonly verbose: boolean;
  readonly config?: string;
  readonly outDir?: string;
};

/** Bad invocation; reported with exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const DEFAULT_SRC_DIR = "src";

/** `--config` when given (it must exist), the default candidates otherwise. */
export function loadConfig(args: CliArgs): StructuralConfig {
  if (args.config === undefined) return readConfig();
  if (!existsSync(args.config)) {
    throw new UsageError(`Config file not found: ${args.config}`);
  }
  return readConfig([args.config]);
}

export function requireDirectory(dir: string): string {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new UsageError(`Directory not found: ${dir}`);
  }
  return dir;
}
