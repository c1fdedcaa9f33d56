import { ToolError } from "../../../utils/base-tool.ts";
import { readJSON, writeJSON } from "../../../utils/file-operations.ts";
import {
  isKeyValuePair,
  isRecord,
  type ChainSpec,
  type KeyValuePair,
  type RawStorage,
} from "../../../utils/types.ts";

export function parseChainSpec(value: unknown, source: string): ChainSpec {
  if (!isRecord(value) || typeof value.name !== "string") {
    throw new ToolError(`${source} is not a chain spec (missing name)`);
  }
  const genesis = value.genesis;
  if (!isRecord(genesis) || !isRecord(genesis.raw) || !isRecord(genesis.raw.top)) {
    throw new ToolError(`${source} is not a raw chain spec (missing genesis.raw.top)`);
  }
  const top: RawStorage = {};
  for (const [key, storageValue] of Object.entries(genesis.raw.top)) {
    if (typeof storageValue !== "string") {
      throw new ToolError(`${source} has a non hex value for ${key}`);
    }
    top[key] = storageValue;
  }
  return {
    ...value,
    name: value.name,
    genesis: { ...genesis, raw: { ...genesis.raw, top } },
  };
}

export async function loadChainSpec(path: string): Promise<ChainSpec> {
  return parseChainSpec(await readJSON(path), path);
}

export async function saveChainSpec(path: string, spec: ChainSpec): Promise<void> {
  await writeJSON(path, spec, 2);
}

// Storage of a raw spec as pairs, same shape as the raw storage dump
export function storagePairsOf(spec: ChainSpec): KeyValuePair[] {
  return Object.entries(spec.genesis.raw.top);
}

export async function saveRawStorage(path: string, pairs: KeyValuePair[]): Promise<void> {
  await writeJSON(path, pairs, 2);
}

export async function loadRawStorage(path: string): Promise<KeyValuePair[]> {
  const content = await readJSON(path);
  if (!Array.isArray(content)) {
    throw new ToolError(`${path} is not a raw storage dump (expecting an array of [key, value])`);
  }
  return content.map((entry: unknown, index: number): KeyValuePair => {
    if (!isKeyValuePair(entry)) {
      throw new ToolError(`${path} entry #${index} is not a [key, value] pair`);
    }
    return [entry[0], entry[1]];
  });
}
