#!/usr/bin/env node
// Forks the live state of a node into a dev chain spec:
// keys and values are downloaded at the given block, the allowed modules are
// migrated into the base spec and the sensitive keys overridden.

import {
  BaseTool,
  FORK_SPEC_PATH,
  KEY_WORKERS,
  NETWORK_YARGS_OPTIONS,
  RAW_STORAGE_PATH,
  RPC_RETRIES,
  RPC_TIMEOUT_MS,
  VALUE_BATCH_SIZE,
  VALUE_WORKERS,
  assertPositiveInteger,
  createGitRunner,
  createRpcClient,
  forkState,
  getBlockHash,
  getChainName,
  getModulesFromApi,
  getRpcClientFactory,
  gitTagSource,
  loadModulesFile,
  resolveNodeVersion,
  runTool,
  switchToTag,
  type CLIOptions,
  type ToolContext,
} from "../index.ts";

interface ForkStateToolOptions extends CLIOptions {
  url: string;
  at?: string;
  "at-block"?: number;
  "base-spec": string;
  output: string;
  "raw-storage": string;
  "reuse-storage": boolean;
  modules?: string;
  name?: string;
  sudo?: string;
  "skip-version": boolean;
  "tag-switch": boolean;
  "key-workers": number;
  "value-workers": number;
  "batch-size": number;
  "rpc-timeout": number;
  "rpc-retries": number;
}

class ForkStateTool extends BaseTool {
  private readonly options: ForkStateToolOptions;

  constructor(options: ForkStateToolOptions, context: ToolContext) {
    super(
      {
        name: "fork-state",
        description: "Fork the state of a live node into a dev chain spec",
      },
      context
    );
    this.options = options;
  }

  async execute(): Promise<void> {
    const api = this.ensureApi();
    const { logger } = this.context;
    const { url } = this.options;
    const rpc = {
      timeoutMs: this.options["rpc-timeout"],
      retries: this.options["rpc-retries"],
    };

    assertPositiveInteger(this.options["key-workers"], "--key-workers");
    assertPositiveInteger(this.options["value-workers"], "--value-workers");
    assertPositiveInteger(this.options["batch-size"], "--batch-size");

    const client = await createRpcClient(url, rpc);
    this.addCleanup(() => client.disconnect());

    const chainName = await getChainName(client, rpc);
    const blockHash = this.options.at || (await getBlockHash(client, this.options["at-block"], rpc));
    logger.info(`Connected to remote chain: Url: ${url}, Chain Name: ${chainName}, Hash: ${blockHash}`);

    if (!this.options["skip-version"]) {
      const git = createGitRunner();
      const version = await resolveNodeVersion(client, blockHash, gitTagSource(git), rpc);
      if (version.fallback) {
        logger.warn(`No tag for client v${version.clientMajor}, using ${version.tag} (spec ${version.specVersion})`);
      }
      logger.info(`Node version: ${version.tag}`);
      if (this.options["tag-switch"]) {
        const { previousBranch, stashed } = await switchToTag(git, version.tag);
        logger.info(
          `Checked out ${version.tag} (was on ${previousBranch || "detached HEAD"}${stashed ? ", changes stashed" : ""})`
        );
      }
    }

    const modules = this.options.modules
      ? await loadModulesFile(this.options.modules)
      : await getModulesFromApi(api, blockHash);
    logger.debug(`Found ${modules.length} modules`);

    const summary = await forkState(getRpcClientFactory(url, rpc), {
      blockHash,
      chainName,
      modules,
      baseSpecPath: this.options["base-spec"],
      outputPath: this.options.output,
      rawStoragePath: this.options["raw-storage"],
      reuseStorage: this.options["reuse-storage"],
      sudo: this.options.sudo,
      spec: this.options.name ? { name: this.options.name } : undefined,
      keyWorkers: this.options["key-workers"],
      valueWorkers: this.options["value-workers"],
      batchSize: this.options["batch-size"],
      rpc,
      logger,
    });
    logger.info(
      `${summary.keys} keys downloaded, ${summary.migrated} migrated, ${summary.removed} removed`
    );
  }
}

await runTool({
  toolClass: ForkStateTool,
  yargsOptions: {
    ...NETWORK_YARGS_OPTIONS,
    at: {
      type: "string",
      description: "Block hash to fork at (defaults to the best block)",
      conflicts: ["at-block"],
    },
    "at-block": {
      type: "number",
      description: "Block number to fork at",
    },
    "base-spec": {
      type: "string",
      description: "Raw chain spec of the dev chain receiving the state",
      default: FORK_SPEC_PATH,
    },
    output: {
      type: "string",
      description: "Where to write the forked chain spec",
      default: FORK_SPEC_PATH,
    },
    "raw-storage": {
      type: "string",
      description: "Where to write the downloaded [key, value] pairs",
      default: RAW_STORAGE_PATH,
    },
    "reuse-storage": {
      type: "boolean",
      description: "Use the raw storage file instead of downloading it again when it exists",
      default: false,
    },
    modules: {
      type: "string",
      description: "JSON file listing the modules ([{ name }]) instead of the node metadata",
    },
    name: {
      type: "string",
      description: "Name of the forked chain (defaults to '<chain> Fork')",
    },
    sudo: {
      type: "string",
      description: "Encoded sudo account, replacing the one of the base spec",
    },
    "skip-version": {
      type: "boolean",
      description: "Do not resolve the node version tag",
      default: false,
    },
    "tag-switch": {
      type: "boolean",
      description: "Check out the tag of the node version (stashes local changes)",
      default: false,
    },
    "key-workers": {
      type: "number",
      description: "Concurrent key scans",
      default: KEY_WORKERS,
    },
    "value-workers": {
      type: "number",
      description: "Concurrent value queries",
      default: VALUE_WORKERS,
    },
    "batch-size": {
      type: "number",
      description: "Keys per state_queryStorageAt call",
      default: VALUE_BATCH_SIZE,
    },
    "rpc-timeout": {
      type: "number",
      description: "Timeout of each RPC call in ms (0 to disable)",
      default: RPC_TIMEOUT_MS,
    },
    "rpc-retries": {
      type: "number",
      description: "Retries of a failing RPC call",
      default: RPC_RETRIES,
    },
  },
});
