import Debug from "debug";

import type { ChainSpec, KeyValuePair, RawStorage } from "../../../utils/types.ts";
import { isAllowedToMigrate } from "./allow-list.ts";
import { loadChainSpec, saveChainSpec } from "./chain-spec.ts";
import { ForceEraManipulator } from "./force-era-manipulator.ts";
import { readStorage, writeStorage, type StateManipulator } from "./genesis-parser.ts";
import { RuntimeUpgradeManipulator } from "./runtime-upgrade-manipulator.ts";
import { manipulateSpec, type SpecOptions } from "./spec-manipulator.ts";
import { SudoManipulator } from "./sudo-manipulator.ts";

const debug = Debug("helper:spec-merger");

export interface MergeOptions {
  // Replaces the sudo account of the base spec
  sudo?: string;
  spec?: SpecOptions;
  // Additional manipulators, run after the fixed ones
  manipulators?: StateManipulator[];
}

export interface MergeResult {
  spec: ChainSpec;
  migrated: number;
  removed: number;
}

// Fixed overrides of every fork. New instances on each call, they hold the read phase state.
export function forkManipulators(options: MergeOptions = {}): StateManipulator[] {
  return [
    new SudoManipulator(options.sudo),
    new RuntimeUpgradeManipulator(),
    new ForceEraManipulator(),
    ...(options.manipulators || []),
  ];
}

// Copies the allowed part of the source storage into the base spec storage.
// Source pairs without value remove the key: it no longer exists at the forked block.
export function mergeForkedStorage(
  baseSpec: ChainSpec,
  sourcePairs: Iterable<KeyValuePair>,
  allowList: readonly string[],
  options: MergeOptions = {},
): MergeResult {
  const manipulators = forkManipulators(options);
  const baseStorage = baseSpec.genesis.raw.top;

  readStorage(baseStorage, manipulators);

  const storage: RawStorage = { ...baseStorage };
  let migrated = 0;
  let removed = 0;
  for (const [key, value] of sourcePairs) {
    if (!isAllowedToMigrate(key, allowList)) {
      continue;
    }
    if (value === null) {
      delete storage[key];
      removed++;
      continue;
    }
    storage[key] = value;
    migrated++;
  }
  debug(`Migrated ${migrated} keys, removed ${removed} absent keys`);

  const top = writeStorage(storage, manipulators);
  const spec = manipulateSpec(
    {
      ...baseSpec,
      genesis: { ...baseSpec.genesis, raw: { ...baseSpec.genesis.raw, top } },
    },
    options.spec,
  );
  return { spec, migrated, removed };
}

// Loads the base spec, merges the forked storage into it and writes it to `outputPath`
// (which can be the base spec itself).
export async function populateDevChain(
  baseSpecPath: string,
  outputPath: string,
  sourcePairs: Iterable<KeyValuePair>,
  allowList: readonly string[],
  options: MergeOptions = {},
): Promise<MergeResult> {
  const baseSpec = await loadChainSpec(baseSpecPath);
  const result = mergeForkedStorage(baseSpec, sourcePairs, allowList, options);
  await saveChainSpec(outputPath, result.spec);
  debug(`Written ${outputPath}`);
  return result;
}
