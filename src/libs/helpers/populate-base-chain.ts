import { ToolError } from "../../utils/base-tool.ts";
import type { KeyValuePair } from "../../utils/types.ts";
import { buildAllowList } from "./state-manipulator/allow-list.ts";
import { loadChainSpec, loadRawStorage, storagePairsOf } from "./state-manipulator/chain-spec.ts";
import { populateDevChain, type MergeResult } from "./state-manipulator/spec-merger.ts";
import { loadModulesFile } from "./modules.ts";

export interface PopulateBaseChainOptions {
  baseSpecPath: string;
  // Defaults to overwriting the base spec
  outputPath?: string;
  supportSpecPath?: string;
  rawStoragePath?: string;
  modulesPath: string;
  sudo?: string;
  name?: string;
}

async function sourcePairsOf(options: PopulateBaseChainOptions): Promise<KeyValuePair[]> {
  if (options.supportSpecPath) {
    return storagePairsOf(await loadChainSpec(options.supportSpecPath));
  }
  if (options.rawStoragePath) {
    return loadRawStorage(options.rawStoragePath);
  }
  throw new ToolError("Either a support spec or a raw storage dump is required");
}

// Offline fork: the storage comes from another spec or a dump instead of a node.
// The base spec stays a usable local network, its boot nodes are kept.
export async function populateBaseChain(
  options: PopulateBaseChainOptions,
): Promise<MergeResult & { outputPath: string }> {
  const outputPath = options.outputPath || options.baseSpecPath;
  const pairs = await sourcePairsOf(options);
  const allowList = buildAllowList(await loadModulesFile(options.modulesPath));
  const result = await populateDevChain(options.baseSpecPath, outputPath, pairs, allowList, {
    sudo: options.sudo,
    spec: { clearBootnodes: false, name: options.name },
  });
  return { ...result, outputPath };
}
