import Debug from "debug";

import { ToolError } from "./base-tool.ts";
import { KEY_WORKERS, VALUE_BATCH_SIZE, VALUE_WORKERS } from "./constants.ts";
import { promiseConcurrent, range } from "./functions.ts";
import { logger as defaultLogger, type Logger } from "./logger.ts";
import {
  getKeys,
  getStorage,
  queryStorageAt,
  type RpcCallOptions,
  type RpcClient,
  type RpcClientFactory,
} from "./rpc.ts";
import type { KeyValuePair, StorageKey } from "./types.ts";
import { WorkQueue } from "./work-queue.ts";

const debug = Debug("utils:storage-query");

// Timer must be wrapped to be passed
const startReport = (total: () => number, label: string) => {
  const t0 = performance.now();
  let timer: NodeJS.Timeout | undefined = undefined;

  const report = () => {
    const t1 = performance.now();
    const duration = t1 - t0;
    const qps = total() / (duration / 1000);
    const used = process.memoryUsage().heapUsed / 1024 / 1024;
    debug(
      `${label} ${total()} keys @ ${qps.toFixed(0)} keys/sec, ${used.toFixed(0)} MB heap used`,
    );

    timer = setTimeout(report, 5000);
  };
  timer = setTimeout(report, 5000);

  const stopReport = () => {
    clearTimeout(timer);
  };

  return stopReport;
};

export function splitPrefix(prefix: string, splitDepth: number) {
  return new Array(256 ** splitDepth)
    .fill(0)
    .map((_, i) => `${prefix}${i.toString(16).padStart(splitDepth * 2, "0")}`);
}

export interface WorkerPoolOptions {
  workers?: number;
  rpc?: RpcCallOptions;
  logger?: Logger;
}

export interface ValueFetchOptions extends WorkerPoolOptions {
  batchSize?: number;
}

// Worker counts and batch sizes come straight from the command line
export function assertPositiveInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ToolError(`Invalid ${label}: ${value} (expecting an integer of at least 1)`);
  }
  return value;
}

// Runs `count` workers, each with its own connection for its whole life.
// The first failure drains the queue so the other workers stop at their next take,
// it is rethrown once every worker has closed its connection.
async function runWorkers<T>(
  count: number,
  clientFactory: RpcClientFactory,
  queue: WorkQueue<T>,
  worker: (client: RpcClient) => Promise<void>,
): Promise<void> {
  const failures: unknown[] = [];
  await promiseConcurrent(
    count,
    async () => {
      try {
        const client = await clientFactory();
        try {
          await worker(client);
        } finally {
          await client.disconnect();
        }
      } catch (error) {
        queue.clear();
        failures.push(error);
      }
    },
    range(count),
  );
  if (failures.length > 0) {
    throw failures[0];
  }
}

// Scans the whole key space at `blockHash`, split by the first key byte (0x00..0xff).
// Workers pull one prefix at a time, so a heavy prefix doesn't hold back the others.
export async function enumerateStorageKeys(
  clientFactory: RpcClientFactory,
  blockHash: string,
  options: WorkerPoolOptions = {},
): Promise<StorageKey[]> {
  const workers = assertPositiveInteger(options.workers ?? KEY_WORKERS, "key worker count");
  const logger = options.logger ?? defaultLogger;
  const queue = new WorkQueue(splitPrefix("0x", 1));
  const keys = new Set<StorageKey>();
  const stopReport = startReport(() => keys.size, "Enumerated");

  try {
    await runWorkers(workers, clientFactory, queue, async (client) => {
      let result: StorageKey[] = [];
      while (true) {
        for (const key of result) {
          keys.add(key);
        }
        const [prefix] = queue.take(1);
        if (prefix === undefined) {
          return;
        }
        result = await getKeys(client, prefix, blockHash, options.rpc);
      }
    });
  } finally {
    stopReport();
  }
  logger.debug(`Enumerated ${keys.size} keys at ${blockHash} with ${workers} workers`);
  return [...keys];
}

// Resolves the value of every key at `blockHash`.
// Each key appears exactly once in the result. A null value means the key was
// gone even for the individual state_getStorage query.
export async function fetchStorageValues(
  clientFactory: RpcClientFactory,
  keys: Iterable<StorageKey>,
  blockHash: string,
  options: ValueFetchOptions = {},
): Promise<KeyValuePair[]> {
  const workers = assertPositiveInteger(options.workers ?? VALUE_WORKERS, "value worker count");
  const batchSize = assertPositiveInteger(options.batchSize ?? VALUE_BATCH_SIZE, "batch size");
  const logger = options.logger ?? defaultLogger;
  const queue = new WorkQueue(new Set(keys));
  const pairs: KeyValuePair[] = [];
  const stopReport = startReport(() => pairs.length, "Fetched");

  try {
    await runWorkers(workers, clientFactory, queue, async (client) => {
      while (true) {
        const chunk = queue.take(batchSize);
        if (chunk.length == 0) {
          return;
        }
        const changes = new Map(await queryStorageAt(client, chunk, blockHash, options.rpc));

        const resolved: KeyValuePair[] = [];
        for (const key of chunk) {
          let value = changes.get(key) ?? null;
          if (value === null) {
            value = await getStorage(client, key, blockHash, options.rpc);
            if (value === null) {
              logger.warn(`No value found for ${key} at ${blockHash}, keeping it as absent`);
            }
          }
          resolved.push([key, value]);
        }
        pairs.push(...resolved);
      }
    });
  } finally {
    stopReport();
  }
  logger.debug(`Fetched ${pairs.length} values at ${blockHash} with ${workers} workers`);
  return pairs;
}
