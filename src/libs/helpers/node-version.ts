import Debug from "debug";

import { ToolError } from "../../utils/base-tool.ts";
import { getRuntimeVersion, getSystemVersion, type RpcCallOptions, type RpcClient } from "../../utils/rpc.ts";
import type { TagSource } from "./git.ts";

const debug = Debug("helper:node-version");

export interface NodeVersion {
  tag: string;
  clientMajor: string;
  specVersion: number;
  // true when the tag was found through the spec version only
  fallback: boolean;
}

// v<client-major>.<spec-version>.0 when it is a known tag. Otherwise any tag whose
// second segment is the spec version, the greatest (string order) when several match.
export function matchVersionTag(
  clientMajor: string,
  specVersion: number,
  tags: readonly string[],
): { tag: string; fallback: boolean } | undefined {
  const candidate = `v${clientMajor}.${specVersion}.0`;
  if (tags.includes(candidate)) {
    return { tag: candidate, fallback: false };
  }
  const matching = tags.filter((tag) => tag.split(".")[1] === `${specVersion}`).sort();
  if (matching.length == 0) {
    return undefined;
  }
  return { tag: matching[matching.length - 1], fallback: true };
}

export async function resolveNodeVersion(
  client: RpcClient,
  blockHash: string,
  listTags: TagSource,
  options?: RpcCallOptions,
): Promise<NodeVersion> {
  const clientMajor = (await getSystemVersion(client, options)).split(".")[0];
  const { specVersion } = await getRuntimeVersion(client, blockHash, options);
  const tags = await listTags();
  debug(`client ${clientMajor}, spec ${specVersion}, ${tags.length} tags`);

  const match = matchVersionTag(clientMajor, specVersion, tags);
  if (!match) {
    throw new ToolError(
      `No tag found for v${clientMajor}.${specVersion}.0 nor any tag of spec version ${specVersion}`,
    );
  }
  return { tag: match.tag, clientMajor, specVersion, fallback: match.fallback };
}
