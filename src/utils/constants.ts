// Worker pool sizes of the two fetch phases
export const KEY_WORKERS = 20;
export const VALUE_WORKERS = 10;

// Maximum number of keys sent in a single state_queryStorageAt call
export const VALUE_BATCH_SIZE = 2000;

// Per-call RPC bounds. A call is attempted RPC_RETRIES + 1 times.
export const RPC_TIMEOUT_MS = 60_000;
export const RPC_RETRIES = 2;

export const DEFAULT_ENDPOINT = "ws://127.0.0.1:9944";

export const OUTPUT_FOLDER = "./output";
export const FORK_SPEC_PATH = `${OUTPUT_FOLDER}/fork.json`;
export const RAW_STORAGE_PATH = `${OUTPUT_FOLDER}/raw_storage.json`;

// Staking.ForceEra encoded as Forcing::ForceNone
export const FORCE_NONE = "0x02";
