import moment from "moment";

import { fileExists } from "../../utils/file-operations.ts";
import { numberWithCommas } from "../../utils/functions.ts";
import { logger as defaultLogger, type Logger } from "../../utils/logger.ts";
import type { RpcCallOptions, RpcClientFactory } from "../../utils/rpc.ts";
import { enumerateStorageKeys, fetchStorageValues } from "../../utils/storage.ts";
import type { KeyValuePair } from "../../utils/types.ts";
import { buildAllowList } from "./state-manipulator/allow-list.ts";
import { loadRawStorage, saveRawStorage } from "./state-manipulator/chain-spec.ts";
import { populateDevChain, type MergeResult } from "./state-manipulator/spec-merger.ts";
import type { SpecOptions } from "./state-manipulator/spec-manipulator.ts";

export interface ForkStateOptions {
  blockHash: string;
  chainName: string;
  // Module metadata records ({ name }) used to build the allow-list
  modules: readonly unknown[];
  baseSpecPath: string;
  outputPath: string;
  rawStoragePath: string;
  // Skips the download when the raw storage dump already exists
  reuseStorage?: boolean;
  sudo?: string;
  spec?: SpecOptions;
  keyWorkers?: number;
  valueWorkers?: number;
  batchSize?: number;
  rpc?: RpcCallOptions;
  logger?: Logger;
}

export interface ForkStateSummary extends MergeResult {
  keys: number;
  allowList: string[];
}

export async function downloadStorage(
  clientFactory: RpcClientFactory,
  options: ForkStateOptions,
): Promise<KeyValuePair[]> {
  const logger = options.logger ?? defaultLogger;
  const storageLogger = logger.child("storage");
  const { blockHash, rpc } = options;

  const t0 = performance.now();
  const keys = await enumerateStorageKeys(clientFactory, blockHash, {
    workers: options.keyWorkers,
    rpc,
    logger: storageLogger,
  });
  logger.info(`Found ${numberWithCommas(keys.length)} keys at ${blockHash}`);

  const pairs = await fetchStorageValues(clientFactory, keys, blockHash, {
    workers: options.valueWorkers,
    batchSize: options.batchSize,
    rpc,
    logger: storageLogger,
  });
  const duration = performance.now() - t0;
  logger.info(
    `Downloaded ${numberWithCommas(pairs.length)} values in ${moment
      .duration(duration / 1000, "seconds")
      .humanize()}`,
  );

  await saveRawStorage(options.rawStoragePath, pairs);
  logger.info(`Raw storage written to ${options.rawStoragePath}`);
  return pairs;
}

// Downloads the storage of the remote chain and merges its allowed part into the base spec
export async function forkState(
  clientFactory: RpcClientFactory,
  options: ForkStateOptions,
): Promise<ForkStateSummary> {
  const logger = options.logger ?? defaultLogger;

  let pairs: KeyValuePair[];
  if (options.reuseStorage && (await fileExists(options.rawStoragePath))) {
    logger.warn(
      `Reusing cached storage ${options.rawStoragePath}, delete it to fetch the latest storage`,
    );
    pairs = await loadRawStorage(options.rawStoragePath);
  } else {
    pairs = await downloadStorage(clientFactory, options);
  }

  const allowList = buildAllowList(options.modules);
  logger.info(`Migrating ${allowList.length} storage prefixes`);

  const result = await populateDevChain(
    options.baseSpecPath,
    options.outputPath,
    pairs,
    allowList,
    {
      sudo: options.sudo,
      spec: { name: `${options.chainName} Fork`, ...options.spec },
    },
  );
  logger.info(
    `Forked spec written to ${options.outputPath}: ${numberWithCommas(result.migrated)} keys migrated`,
  );
  return { ...result, keys: pairs.length, allowList };
}
