import { u8aConcat, u8aToHex } from "@polkadot/util";
import { xxhashAsU8a } from "@polkadot/util-crypto";

// twox-128 of the module name: xxhash64 with seeds 0 and 1, each digest in
// little-endian byte order, concatenated. 16 bytes, "0x" + 32 hex digits.
export function modulePrefix(moduleName: string): string {
  return u8aToHex(xxhashAsU8a(moduleName, 128));
}

// Key of a plain storage value, or prefix of a map: twox128(module) ++ twox128(item)
export function encodeStorageKey(moduleName: string, name: string): string {
  return u8aToHex(u8aConcat(xxhashAsU8a(moduleName, 128), xxhashAsU8a(name, 128)));
}

export const SYSTEM_ACCOUNT_PREFIX = encodeStorageKey("System", "Account");
export const SUDO_KEY = encodeStorageKey("Sudo", "Key");
export const LAST_RUNTIME_UPGRADE_KEY = encodeStorageKey("System", "LastRuntimeUpgrade");
export const FORCE_ERA_KEY = encodeStorageKey("Staking", "ForceEra");

// Well-known key ":code" holding the runtime wasm
export const RUNTIME_CODE_KEY = "0x3a636f6465";
