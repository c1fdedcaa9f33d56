// 0x-prefixed hex encoding of a raw storage key
export type StorageKey = string;

// Raw SCALE-encoded value, null when the key holds nothing at the queried block
export type StorageValue = string | null;

// Same shape as the entries of state_queryStorageAt `changes` and of the raw storage dump
export type KeyValuePair = [StorageKey, StorageValue];

export type RawStorage = Record<StorageKey, string>;

export interface ChainSpecRaw {
  top: RawStorage;
  [field: string]: unknown;
}

export interface ChainSpecGenesis {
  raw: ChainSpecRaw;
  [field: string]: unknown;
}

// Only the fields the fork touches are typed, everything else is carried over as is
export interface ChainSpec {
  name: string;
  genesis: ChainSpecGenesis;
  [field: string]: unknown;
}

export interface RuntimeVersion {
  specName: string;
  specVersion: number;
  [field: string]: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

export function isKeyValuePair(value: unknown): value is KeyValuePair {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "string" &&
    (typeof value[1] === "string" || value[1] === null)
  );
}
