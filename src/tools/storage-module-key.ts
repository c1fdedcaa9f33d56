#!/usr/bin/env node

import {
  BaseTool,
  SKIPPED_MODULES,
  encodeStorageKey,
  modulePrefix,
  runTool,
  type CLIOptions,
  type ToolContext,
} from "../index.ts";

interface StorageModuleKeyOptions extends CLIOptions {
  module: string;
  name?: string;
}

class StorageModuleKeyTool extends BaseTool {
  private readonly options: StorageModuleKeyOptions;

  constructor(options: StorageModuleKeyOptions, context: ToolContext) {
    super({ name: "storage-module-key", description: "Print storage prefixes" }, context);
    this.options = options;
  }

  async execute(): Promise<void> {
    const { module, name } = this.options;
    const skipped = SKIPPED_MODULES.includes(module) ? " (never migrated)" : "";
    console.log(`${module}: ${modulePrefix(module)}${skipped}`);
    if (name) {
      console.log(`${module}::${name}: ${encodeStorageKey(module, name)}`);
    }
  }
}

await runTool({
  toolClass: StorageModuleKeyTool,
  requiresApi: false,
  yargsOptions: {
    module: {
      type: "string",
      description: "name of the module (ex: Staking)",
      demandOption: true,
    },
    name: {
      type: "string",
      description: "name of the storage (ex: ForceEra)",
    },
  },
});
