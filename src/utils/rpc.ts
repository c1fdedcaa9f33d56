import Debug from "debug";

import { ToolError } from "./base-tool.ts";
import { RPC_RETRIES, RPC_TIMEOUT_MS } from "./constants.ts";
import {
  isKeyValuePair,
  isRecord,
  isStringArray,
  type KeyValuePair,
  type RuntimeVersion,
  type StorageValue,
} from "./types.ts";

const debug = Debug("utils:rpc");

// Subset of the @polkadot/rpc-provider interface used by the fork.
// Both WsProvider and HttpProvider satisfy it.
export interface RpcClient {
  send(method: string, params: unknown[]): Promise<unknown>;
  disconnect(): Promise<void>;
}

export type RpcClientFactory = () => Promise<RpcClient>;

export interface RpcCallOptions {
  // 0 disables the timeout
  timeoutMs?: number;
  retries?: number;
}

export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  if (timeoutMs <= 0) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
};

export async function rpcCall(
  client: RpcClient,
  method: string,
  params: unknown[],
  options: RpcCallOptions = {},
): Promise<unknown> {
  const { timeoutMs = RPC_TIMEOUT_MS, retries = RPC_RETRIES } = options;
  let lastError: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await withTimeout(client.send(method, params), timeoutMs, method);
    } catch (error) {
      lastError = error;
      debug(`${method} attempt ${attempt + 1}/${retries + 1} failed: ${String(error)}`);
    }
  }
  throw new ToolError(`RPC ${method} failed after ${retries + 1} attempt(s)`, 1, lastError);
}

const unexpected = (method: string, result: unknown) =>
  new ToolError(`Unexpected ${method} response: ${JSON.stringify(result)?.slice(0, 200)}`, 1, result);

export async function getChainName(client: RpcClient, options?: RpcCallOptions): Promise<string> {
  const result = await rpcCall(client, "system_chain", [], options);
  if (typeof result !== "string") {
    throw unexpected("system_chain", result);
  }
  return result;
}

export async function getSystemVersion(client: RpcClient, options?: RpcCallOptions): Promise<string> {
  const result = await rpcCall(client, "system_version", [], options);
  if (typeof result !== "string") {
    throw unexpected("system_version", result);
  }
  return result;
}

export async function getRuntimeVersion(
  client: RpcClient,
  blockHash: string,
  options?: RpcCallOptions,
): Promise<RuntimeVersion> {
  const result = await rpcCall(client, "state_getRuntimeVersion", [blockHash], options);
  if (
    !isRecord(result) ||
    typeof result.specName !== "string" ||
    typeof result.specVersion !== "number"
  ) {
    throw unexpected("state_getRuntimeVersion", result);
  }
  return { ...result, specName: result.specName, specVersion: result.specVersion };
}

// Hash of the best block when no block number is given
export async function getBlockHash(
  client: RpcClient,
  blockNumber?: number,
  options?: RpcCallOptions,
): Promise<string> {
  const params = blockNumber === undefined ? [] : [blockNumber];
  const result = await rpcCall(client, "chain_getBlockHash", params, options);
  if (typeof result !== "string") {
    throw unexpected("chain_getBlockHash", result);
  }
  return result;
}

export async function getKeys(
  client: RpcClient,
  prefix: string,
  blockHash: string,
  options?: RpcCallOptions,
): Promise<string[]> {
  const result = await rpcCall(client, "state_getKeys", [prefix, blockHash], options);
  if (!isStringArray(result)) {
    throw unexpected("state_getKeys", result);
  }
  return result;
}

// The batched endpoint can report null for keys that do hold a value,
// callers have to repair those with getStorage.
export async function queryStorageAt(
  client: RpcClient,
  keys: string[],
  blockHash: string,
  options?: RpcCallOptions,
): Promise<KeyValuePair[]> {
  const result = await rpcCall(client, "state_queryStorageAt", [keys, blockHash], options);
  if (!Array.isArray(result)) {
    throw unexpected("state_queryStorageAt", result);
  }
  if (result.length == 0) {
    return [];
  }
  const [changeSet] = result;
  if (!isRecord(changeSet) || !Array.isArray(changeSet.changes)) {
    throw unexpected("state_queryStorageAt", result);
  }
  const changes: KeyValuePair[] = [];
  for (const change of changeSet.changes) {
    if (!isKeyValuePair(change)) {
      throw unexpected("state_queryStorageAt", change);
    }
    changes.push([change[0], change[1]]);
  }
  return changes;
}

export async function getStorage(
  client: RpcClient,
  key: string,
  blockHash: string,
  options?: RpcCallOptions,
): Promise<StorageValue> {
  const result = await rpcCall(client, "state_getStorage", [key, blockHash], options);
  if (typeof result === "string") {
    return result;
  }
  if (result === null || result === undefined) {
    return null;
  }
  throw unexpected("state_getStorage", result);
}
