import { describe, expect, it } from "vitest";

import { buildAllowList } from "../src/libs/helpers/state-manipulator/allow-list.ts";
import { parseChainSpec } from "../src/libs/helpers/state-manipulator/chain-spec.ts";
import { mergeForkedStorage } from "../src/libs/helpers/state-manipulator/spec-merger.ts";
import {
  FORCE_ERA_KEY,
  LAST_RUNTIME_UPGRADE_KEY,
  RUNTIME_CODE_KEY,
  SUDO_KEY,
  SYSTEM_ACCOUNT_PREFIX,
  modulePrefix,
} from "../src/libs/helpers/state-manipulator/storage-keys.ts";
import { ToolError } from "../src/utils/base-tool.ts";
import type { ChainSpec, KeyValuePair, RawStorage } from "../src/utils/types.ts";

const ACCOUNT_KEY = `${SYSTEM_ACCOUNT_PREFIX}00`;
const SESSION_KEY = `${modulePrefix("Session")}aa`;
const STAKING_KEY = `${modulePrefix("Staking")}11`;

const baseSpecWith = (top: RawStorage): ChainSpec => ({
  name: "Development",
  id: "dev",
  bootNodes: ["/ip4/127.0.0.1/tcp/30333/p2p/placeholder"],
  properties: { tokenDecimals: 12 },
  genesis: { raw: { top, childrenDefault: {} } },
});

const allowList = buildAllowList([
  { name: "System" },
  { name: "Sudo" },
  { name: "Staking" },
  { name: "Session" },
]);

const forkedPairs: KeyValuePair[] = [
  [SUDO_KEY, "0xbb"],
  [ACCOUNT_KEY, "0x01"],
  [LAST_RUNTIME_UPGRADE_KEY, "0x99"],
  [FORCE_ERA_KEY, "0x00"],
  [SESSION_KEY, "0x05"],
  [RUNTIME_CODE_KEY, "0xc0de"],
];

describe("mergeForkedStorage", () => {
  const baseSpec = baseSpecWith({
    [SUDO_KEY]: "0xaa",
    [LAST_RUNTIME_UPGRADE_KEY]: "0x01",
    [RUNTIME_CODE_KEY]: "0x00",
  });

  it("merges the allowed storage and overrides the fork keys", () => {
    const { spec, migrated, removed } = mergeForkedStorage(baseSpec, forkedPairs, allowList);
    expect(spec.genesis.raw.top).toEqual({
      [SUDO_KEY]: "0xaa",
      [ACCOUNT_KEY]: "0x01",
      [FORCE_ERA_KEY]: "0x02",
      [RUNTIME_CODE_KEY]: "0xc0de",
    });
    expect(migrated).toBe(4);
    expect(removed).toBe(0);
  });

  it("keeps the rest of the spec and clears the boot nodes", () => {
    const { spec } = mergeForkedStorage(baseSpec, forkedPairs, allowList, {
      spec: { name: "Development Fork" },
    });
    expect(spec.name).toBe("Development Fork");
    expect(spec.id).toBe("dev");
    expect(spec.bootNodes).toEqual([]);
    expect(spec.properties).toEqual({ tokenDecimals: 12 });
    expect(spec.genesis.raw.childrenDefault).toEqual({});
  });

  it("leaves the base spec untouched", () => {
    mergeForkedStorage(baseSpec, forkedPairs, allowList);
    expect(baseSpec.genesis.raw.top).toEqual({
      [SUDO_KEY]: "0xaa",
      [LAST_RUNTIME_UPGRADE_KEY]: "0x01",
      [RUNTIME_CODE_KEY]: "0x00",
    });
    expect(baseSpec.name).toBe("Development");
  });

  it("gives the same result when merged twice", () => {
    const once = mergeForkedStorage(baseSpec, forkedPairs, allowList).spec;
    const twice = mergeForkedStorage(once, forkedPairs, allowList).spec;
    expect(twice.genesis.raw.top).toEqual(once.genesis.raw.top);
  });

  it("removes keys without value at the forked block", () => {
    const { spec, migrated, removed } = mergeForkedStorage(
      baseSpecWith({ [SUDO_KEY]: "0xaa", [STAKING_KEY]: "0x07" }),
      [
        [STAKING_KEY, null],
        [SESSION_KEY, null],
      ],
      allowList,
    );
    expect(spec.genesis.raw.top).toEqual({ [SUDO_KEY]: "0xaa", [FORCE_ERA_KEY]: "0x02" });
    expect(migrated).toBe(0);
    expect(removed).toBe(1);
  });

  it("uses the given sudo account over the base one", () => {
    const { spec } = mergeForkedStorage(baseSpec, forkedPairs, allowList, { sudo: "0xcc" });
    expect(spec.genesis.raw.top[SUDO_KEY]).toBe("0xcc");
  });

  it("requires a sudo account", () => {
    const withoutSudo = baseSpecWith({ [RUNTIME_CODE_KEY]: "0x00" });
    expect(() => mergeForkedStorage(withoutSudo, forkedPairs, allowList)).toThrow(ToolError);
    expect(() => mergeForkedStorage(withoutSudo, forkedPairs, allowList)).toThrow(
      `Base chain spec has no sudo key (${SUDO_KEY})`,
    );
    const { spec } = mergeForkedStorage(withoutSudo, forkedPairs, allowList, { sudo: "0xcc" });
    expect(spec.genesis.raw.top[SUDO_KEY]).toBe("0xcc");
  });

  it("runs additional manipulators after the fixed ones", () => {
    const seen: string[] = [];
    const { spec } = mergeForkedStorage(baseSpec, forkedPairs, allowList, {
      manipulators: [
        {
          processRead: ({ key }) => {
            seen.push(key);
          },
          prepareWrite: () => {},
          processWrite: ({ key }) =>
            key == ACCOUNT_KEY
              ? { action: "remove", extraLines: [{ key: `${SYSTEM_ACCOUNT_PREFIX}01`, value: "0x02" }] }
              : undefined,
        },
      ],
    });
    expect(seen.sort()).toEqual([LAST_RUNTIME_UPGRADE_KEY, RUNTIME_CODE_KEY, SUDO_KEY].sort());
    expect(spec.genesis.raw.top[ACCOUNT_KEY]).toBeUndefined();
    expect(spec.genesis.raw.top[`${SYSTEM_ACCOUNT_PREFIX}01`]).toBe("0x02");
  });
});

describe("parseChainSpec", () => {
  it("accepts a raw chain spec", () => {
    const spec = parseChainSpec(baseSpecWith({ "0x01": "0x02" }), "dev.json");
    expect(spec.genesis.raw.top).toEqual({ "0x01": "0x02" });
  });

  it("rejects a non raw chain spec", () => {
    expect(() => parseChainSpec({ name: "Dev", genesis: { runtime: {} } }, "dev.json")).toThrow(
      "dev.json is not a raw chain spec (missing genesis.raw.top)",
    );
    expect(() => parseChainSpec([], "dev.json")).toThrow("dev.json is not a chain spec (missing name)");
  });

  it("rejects non hex storage values", () => {
    expect(() =>
      parseChainSpec({ name: "Dev", genesis: { raw: { top: { "0x01": 2 } } } }, "dev.json"),
    ).toThrow("dev.json has a non hex value for 0x01");
  });
});
