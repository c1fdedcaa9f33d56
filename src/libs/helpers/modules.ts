import "@polkadot/api-augment";

import type { ApiPromise } from "@polkadot/api";

import { ToolError } from "../../utils/base-tool.ts";
import { readJSON } from "../../utils/file-operations.ts";
import { toModuleRecord, type ModuleRecord } from "./state-manipulator/allow-list.ts";

// Pallets of the runtime metadata at the given block
export async function getModulesFromApi(api: ApiPromise, blockHash?: string): Promise<ModuleRecord[]> {
  const metadata = blockHash
    ? await api.rpc.state.getMetadata(blockHash)
    : await api.rpc.state.getMetadata();
  return metadata.asLatest.pallets.map((pallet) => ({ name: pallet.name.toString() }));
}

// Pre-fetched module list: a JSON array of records having at least a `name`
export async function loadModulesFile(path: string): Promise<ModuleRecord[]> {
  const content = await readJSON(path);
  if (!Array.isArray(content)) {
    throw new ToolError(`${path} must contain an array of modules`);
  }
  return content.map((entry: unknown, index: number) => toModuleRecord(entry, index));
}
