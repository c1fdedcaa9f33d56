import { ApiPromise, HttpProvider, WsProvider } from "@polkadot/api";
import type { Options } from "yargs";

import { ToolError } from "./base-tool.ts";
import { DEFAULT_ENDPOINT, RPC_TIMEOUT_MS } from "./constants.ts";
import { withTimeout, type RpcCallOptions, type RpcClient, type RpcClientFactory } from "./rpc.ts";

export type NetworkOptions = {
  url: Options & { type: "string" };
};

export type Argv = {
  url?: string;
};

export const NETWORK_YARGS_OPTIONS: NetworkOptions = {
  url: {
    type: "string",
    description: "Websocket or http url of the node to fork",
    default: DEFAULT_ENDPOINT,
    string: true,
  },
};

export function isWsUrl(url: string): boolean {
  return /^wss?:\/\//.test(url);
}

export function isHttpUrl(url: string): boolean {
  return /^https?:\/\//.test(url);
}

// Supports both transports. Large responses (state_queryStorageAt batches)
// can go over the node's ws frame limit, http has no such limit.
export const getProviderFor = (url: string): WsProvider | HttpProvider => {
  if (isWsUrl(url)) {
    return new WsProvider(url);
  }
  if (isHttpUrl(url)) {
    return new HttpProvider(url);
  }
  throw new ToolError(`Unsupported endpoint ${url}, expecting ws(s):// or http(s)://`);
};

// WsProvider keeps reconnecting and isReady never rejects:
// the connection is given up after `timeoutMs` (0 waits forever).
export interface ConnectingProvider extends RpcClient {
  isReady: Promise<unknown>;
}

export async function waitForConnection<P extends ConnectingProvider>(
  provider: P,
  url: string,
  timeoutMs: number = RPC_TIMEOUT_MS,
): Promise<P> {
  try {
    await withTimeout(provider.isReady, timeoutMs, `Connection to ${url}`);
  } catch (error) {
    await provider.disconnect();
    throw new ToolError(`Could not connect to ${url}: ${String(error)}`, 1, error);
  }
  return provider;
}

export const createRpcClient = async (
  url: string,
  options: RpcCallOptions = {},
): Promise<RpcClient> => {
  const provider = getProviderFor(url);
  if (provider instanceof WsProvider) {
    return waitForConnection(provider, url, options.timeoutMs);
  }
  return provider;
};

// Every call gives a new connection, each worker owns its own
export const getRpcClientFactory =
  (url: string, options: RpcCallOptions = {}): RpcClientFactory =>
  () =>
    createRpcClient(url, options);

export const getApiFor = async (argv: Argv, timeoutMs: number = RPC_TIMEOUT_MS) => {
  const url = argv.url || DEFAULT_ENDPOINT;
  const provider = getProviderFor(url);
  if (provider instanceof WsProvider) {
    await waitForConnection(provider, url, timeoutMs);
  }
  return await ApiPromise.create({
    noInitWarn: true,
    provider,
  });
};
