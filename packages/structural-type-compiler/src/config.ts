// packages/structural-type-compiler/src/config.ts
import { existsSync, readFileSync } from "node:fs";

export type StructuralConfig = {
  /** JSDoc tag marking a declaration for derivation. */
  tag: string;
  /** Property that names the case of an object variant. */
  discriminant: string;
  /** Module the generated code imports the canonical vocabulary from. */
  runtimeModule: string;
  /** File suffix of generated companion modules. */
  companionSuffix: string;
  /** Extension written into relative import specifiers of companions. */
  importExtension: string;
};

export const DEFAULT_CONFIG: StructuralConfig = {
  tag: "structural",
  discriminant: "type",
  runtimeModule: "structural-type-spec",
  companionSuffix: ".structural.ts",
  importExtension: ".js",
};

export const CONFIG_CANDIDATES = ["structural.config.json"];

/**
 * Load configuration from the first candidate file that exists.
 *
 * Missing files fall through to the next candidate; a file that is not valid
 * JSON stops the search with a warning. Either way the defaults fill in
 * whatever the file does not provide.
 */
export function readConfig(
  candidates: readonly string[] = CONFIG_CANDIDATES,
): StructuralConfig {
  for (const path of candidates) {
    if (!existsSync(path)) continue;
    const txt = readFileSync(path, "utf8");
    try {
      return mergeConfig(JSON.parse(txt), path);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      console.warn(
        `Failed to parse ${path}: ${err.message}. Falling back to defaults.`,
      );
      break;
    }
  }
  return { ...DEFAULT_CONFIG };
}

export function mergeConfig(raw: unknown, source = "config"): StructuralConfig {
  const config = { ...DEFAULT_CONFIG };
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    console.warn(`Ignoring ${source}: expected a JSON object.`);
    return config;
  }
  const entries = new Map(Object.entries(raw));
  for (const key of Object.keys(DEFAULT_CONFIG)) {
    if (!isConfigKey(key) || !entries.has(key)) continue;
    const value = entries.get(key);
    if (typeof value === "string") {
      config[key] = value;
    } else {
      console.warn(`Ignoring ${key} in ${source}: expected a string.`);
    }
  }
  return config;
}

function isConfigKey(key: string): key is keyof StructuralConfig {
  return key in DEFAULT_CONFIG;
}
