#!/usr/bin/env node
// Offline variant of fork-state: the storage comes from another raw chain spec
// (or a raw storage dump) instead of a live node.

import { BaseTool, populateBaseChain, runTool, type CLIOptions, type ToolContext } from "../index.ts";

interface PopulateBaseChainToolOptions extends CLIOptions {
  "base-spec": string;
  "support-spec"?: string;
  "raw-storage"?: string;
  modules: string;
  output?: string;
  sudo?: string;
  name?: string;
}

class PopulateBaseChainTool extends BaseTool {
  private readonly options: PopulateBaseChainToolOptions;

  constructor(options: PopulateBaseChainToolOptions, context: ToolContext) {
    super(
      {
        name: "populate-base-chain",
        description: "Migrate the storage of a chain spec into a base chain spec",
      },
      context
    );
    this.options = options;
  }

  async execute(): Promise<void> {
    const { logger } = this.context;
    const { migrated, removed, outputPath } = await populateBaseChain({
      baseSpecPath: this.options["base-spec"],
      outputPath: this.options.output,
      supportSpecPath: this.options["support-spec"],
      rawStoragePath: this.options["raw-storage"],
      modulesPath: this.options.modules,
      sudo: this.options.sudo,
      name: this.options.name,
    });
    logger.info(`${migrated} keys migrated, ${removed} removed, written to ${outputPath}`);
  }
}

await runTool({
  toolClass: PopulateBaseChainTool,
  requiresApi: false,
  yargsOptions: {
    "base-spec": {
      type: "string",
      description: "Raw chain spec receiving the storage",
      demandOption: true,
    },
    "support-spec": {
      type: "string",
      description: "Raw chain spec providing the storage",
      conflicts: ["raw-storage"],
    },
    "raw-storage": {
      type: "string",
      description: "Raw storage dump ([key, value] pairs) providing the storage",
    },
    modules: {
      type: "string",
      description: "JSON file listing the modules ([{ name }])",
      demandOption: true,
    },
    output: {
      type: "string",
      description: "Where to write the result (defaults to overwriting --base-spec)",
    },
    sudo: {
      type: "string",
      description: "Encoded sudo account, replacing the one of the base spec",
    },
    name: {
      type: "string",
      description: "New name of the chain",
    },
  },
});
