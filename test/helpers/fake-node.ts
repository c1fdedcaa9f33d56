import type { RpcClient, RpcClientFactory } from "../../src/utils/rpc.ts";
import { isStringArray } from "../../src/utils/types.ts";

export interface FakeNodeOptions {
  chain?: string;
  version?: string;
  specVersion?: number;
  blockHash?: string;
  // Keys reported as null by state_queryStorageAt while holding a value
  batchNulls?: string[];
  // Keys removed between the key scan and the value queries
  deletedAfterScan?: string[];
}

export interface RecordedCall {
  method: string;
  params: unknown[];
}

// In-process stand-in for a node, answering the RPC methods the fork uses
export class FakeNode {
  public readonly calls: RecordedCall[] = [];
  public connections = 0;
  public disconnections = 0;
  private readonly storage: Map<string, string>;
  private readonly options: FakeNodeOptions;

  constructor(storage: Record<string, string>, options: FakeNodeOptions = {}) {
    this.storage = new Map(Object.entries(storage));
    this.options = options;
  }

  get blockHash(): string {
    return this.options.blockHash ?? "0xb10c";
  }

  callsOf(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method == method);
  }

  private valueAt(key: string): string | null {
    if (this.options.deletedAfterScan?.includes(key)) {
      return null;
    }
    return this.storage.get(key) ?? null;
  }

  async handle(method: string, params: unknown[]): Promise<unknown> {
    this.calls.push({ method, params });
    // Let other workers run between calls, like a network round-trip would
    await new Promise((resolve) => setImmediate(resolve));
    switch (method) {
      case "system_chain":
        return this.options.chain ?? "Fake Chain";
      case "system_version":
        return this.options.version ?? "3.0.0-abcdef";
      case "chain_getBlockHash":
        return this.blockHash;
      case "state_getRuntimeVersion":
        return { specName: "fake", specVersion: this.options.specVersion ?? 108 };
      case "state_getKeys": {
        const [prefix] = params;
        return [...this.storage.keys()].filter(
          (key) => typeof prefix == "string" && key.startsWith(prefix),
        );
      }
      case "state_queryStorageAt": {
        const [keys, at] = params;
        const requested = isStringArray(keys) ? keys : [];
        return [
          {
            block: at,
            changes: requested.map((key) => [
              key,
              this.options.batchNulls?.includes(key) ? null : this.valueAt(key),
            ]),
          },
        ];
      }
      case "state_getStorage": {
        const [key] = params;
        return typeof key == "string" ? this.valueAt(key) : null;
      }
      default:
        throw new Error(`Method ${method} not found`);
    }
  }

  client(): RpcClient {
    this.connections++;
    return {
      send: (method, params) => this.handle(method, params),
      disconnect: async () => {
        this.disconnections++;
      },
    };
  }

  factory(): RpcClientFactory {
    return async () => this.client();
  }
}

// Deterministic key/value set spread over the first key byte
export function sampleStorage(count: number): Record<string, string> {
  const storage: Record<string, string> = {};
  for (let i = 0; i < count; i++) {
    const first = ((i * 37) % 256).toString(16).padStart(2, "0");
    const rest = i.toString(16).padStart(6, "0");
    storage[`0x${first}${rest}`] = `0x${(i % 251).toString(16).padStart(2, "0")}`;
  }
  return storage;
}
