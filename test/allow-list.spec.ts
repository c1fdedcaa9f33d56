import { describe, expect, it } from "vitest";

import {
  ALWAYS_MIGRATED_PREFIXES,
  SKIPPED_MODULES,
  buildAllowList,
  isAllowedToMigrate,
} from "../src/libs/helpers/state-manipulator/allow-list.ts";
import {
  RUNTIME_CODE_KEY,
  SYSTEM_ACCOUNT_PREFIX,
  modulePrefix,
} from "../src/libs/helpers/state-manipulator/storage-keys.ts";
import { ToolError } from "../src/utils/base-tool.ts";

describe("buildAllowList", () => {
  it("always starts with System.Account and the runtime code", () => {
    expect(buildAllowList([])).toEqual([SYSTEM_ACCOUNT_PREFIX, RUNTIME_CODE_KEY]);
    expect(ALWAYS_MIGRATED_PREFIXES).toEqual([SYSTEM_ACCOUNT_PREFIX, RUNTIME_CODE_KEY]);
  });

  it("adds the prefix of every module in metadata order", () => {
    const allowList = buildAllowList([{ name: "Balances" }, { name: "Staking" }]);
    expect(allowList).toEqual([
      SYSTEM_ACCOUNT_PREFIX,
      RUNTIME_CODE_KEY,
      modulePrefix("Balances"),
      modulePrefix("Staking"),
    ]);
  });

  it("skips the consensus and system modules", () => {
    const modules = [...SKIPPED_MODULES, "Balances"].map((name) => ({ name }));
    expect(buildAllowList(modules)).toEqual([
      SYSTEM_ACCOUNT_PREFIX,
      RUNTIME_CODE_KEY,
      modulePrefix("Balances"),
    ]);
    expect(SKIPPED_MODULES).toHaveLength(7);
  });

  it("ignores the other fields of the metadata records", () => {
    const allowList = buildAllowList([{ name: "Balances", index: 4, storage: null }]);
    expect(allowList[2]).toBe(modulePrefix("Balances"));
  });

  it("rejects records without a name", () => {
    expect(() => buildAllowList([{ name: "Balances" }, { index: 4 }])).toThrow(ToolError);
    expect(() => buildAllowList([{ name: "Balances" }, { index: 4 }])).toThrow(
      'Module metadata entry #1 has no name: {"index":4}',
    );
    expect(() => buildAllowList(["Balances"])).toThrow(ToolError);
  });
});

describe("isAllowedToMigrate", () => {
  const allowList = buildAllowList([{ name: "System" }, { name: "Balances" }]);

  it("accepts keys under an allowed prefix", () => {
    expect(isAllowedToMigrate(`${SYSTEM_ACCOUNT_PREFIX}0011`, allowList)).toBe(true);
    expect(isAllowedToMigrate(`${modulePrefix("Balances")}aabb`, allowList)).toBe(true);
    expect(isAllowedToMigrate(RUNTIME_CODE_KEY, allowList)).toBe(true);
  });

  it("rejects the rest of the skipped modules", () => {
    expect(isAllowedToMigrate(`${modulePrefix("System")}00`, allowList)).toBe(false);
    expect(isAllowedToMigrate(`${modulePrefix("Session")}00`, allowList)).toBe(false);
  });

  it("rejects everything with an empty allow-list", () => {
    expect(isAllowedToMigrate(RUNTIME_CODE_KEY, [])).toBe(false);
  });
});
