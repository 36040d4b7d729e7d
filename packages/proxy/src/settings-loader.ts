import { readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import {
  type AdapterSettings,
  parseLegacyJsonSettings,
  parseYamlSettings,
} from "@native-tool-adapter/core";
import type { Logger } from "./types.js";

const DEFAULT_SETTING_FILES = ["setting.yaml", "setting.json"];

export interface SettingsLoadOptions {
  /** Explicit settings file; otherwise `setting.yaml`, then `setting.json`. */
  path?: string;
  cwd?: string;
  logger?: Pick<Logger, "info">;
}

async function readIfPresent(file: string): Promise<string | undefined> {
  try {
    return await readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return;
    }
    throw error;
  }
}

/**
 * Loads the rewrite rules. A missing file means no rules; a file that does
 * not parse throws `AdapterSettingsError`.
 */
export async function loadSettings(
  options: SettingsLoadOptions = {}
): Promise<AdapterSettings> {
  const cwd = options.cwd ?? process.cwd();
  const candidates = options.path ? [options.path] : DEFAULT_SETTING_FILES;

  for (const candidate of candidates) {
    const file = resolve(cwd, candidate);
    const source = await readIfPresent(file);
    if (source === undefined) {
      continue;
    }
    const settings =
      extname(file).toLowerCase() === ".json"
        ? parseLegacyJsonSettings(source)
        : parseYamlSettings(source);
    options.logger?.info(
      `[proxy] Loaded ${settings.rules.length} rewrite rule(s) from ${file}`
    );
    return settings;
  }
  return { rules: [] };
}
