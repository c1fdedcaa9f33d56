import Debug from "debug";

import type { ChainSpec } from "../../../utils/types.ts";

const debug = Debug("helper:spec-manipulator");

export interface SpecOptions {
  clearBootnodes?: boolean;
  name?: string;
  id?: string;
}

// Chain level fields (outside of the genesis storage)
export function manipulateSpec(spec: ChainSpec, options: SpecOptions = {}): ChainSpec {
  const { clearBootnodes, name, id } = { clearBootnodes: true, ...options };
  const result: ChainSpec = { ...spec };
  if (clearBootnodes && "bootNodes" in result) {
    debug(`Clearing bootNodes`);
    result.bootNodes = [];
  }
  if (name) {
    debug(`Renaming ${spec.name} to ${name}`);
    result.name = name;
  }
  if (id) {
    result.id = id;
  }
  return result;
}
