import Debug from "debug";

import { ToolError } from "../../../utils/base-tool.ts";
import { isRecord } from "../../../utils/types.ts";
import { modulePrefix, RUNTIME_CODE_KEY, SYSTEM_ACCOUNT_PREFIX } from "./storage-keys.ts";

const debug = Debug("helper:allow-list");

// Importing these modules would break block production and finality on the fork
export const SKIPPED_MODULES: readonly string[] = [
  "System",
  "Session",
  "Babe",
  "Grandpa",
  "GrandpaFinality",
  "FinalityTracker",
  "Authorship",
];

// Kept even though System is skipped: account balances and the runtime code
export const ALWAYS_MIGRATED_PREFIXES: readonly string[] = [SYSTEM_ACCOUNT_PREFIX, RUNTIME_CODE_KEY];

export interface ModuleRecord {
  name: string;
}

export function toModuleRecord(entry: unknown, index: number): ModuleRecord {
  if (!isRecord(entry) || typeof entry.name !== "string") {
    throw new ToolError(`Module metadata entry #${index} has no name: ${JSON.stringify(entry)}`);
  }
  return { name: entry.name };
}

export function buildAllowList(modules: readonly unknown[]): string[] {
  const allowList = [...ALWAYS_MIGRATED_PREFIXES];
  modules.forEach((entry, index) => {
    const { name } = toModuleRecord(entry, index);
    if (SKIPPED_MODULES.includes(name)) {
      debug(`Skipping module ${name}`);
      return;
    }
    allowList.push(modulePrefix(name));
  });
  return allowList;
}

// Plain string prefix test: prefixes are whole bytes, so hex digits always line up
export function isAllowedToMigrate(key: string, allowList: readonly string[]): boolean {
  return allowList.some((prefix) => key.startsWith(prefix));
}
