#!/usr/bin/env node
// Finds the git tag of the node build that produced the state at a given block,
// and optionally checks it out.

import {
  BaseTool,
  NETWORK_YARGS_OPTIONS,
  createGitRunner,
  createRpcClient,
  getBlockHash,
  getChainName,
  gitTagSource,
  resolveNodeVersion,
  runTool,
  switchToTag,
  type CLIOptions,
  type ToolContext,
} from "../index.ts";

interface GetNodeVersionOptions extends CLIOptions {
  url: string;
  at?: string;
  "tag-switch": boolean;
  repository?: string;
}

class GetNodeVersionTool extends BaseTool {
  private readonly options: GetNodeVersionOptions;

  constructor(options: GetNodeVersionOptions, context: ToolContext) {
    super(
      {
        name: "get-node-version",
        description: "Resolve the node version tag of a live chain",
      },
      context
    );
    this.options = options;
  }

  async execute(): Promise<void> {
    const { logger } = this.context;
    const client = await createRpcClient(this.options.url);
    this.addCleanup(() => client.disconnect());

    const chainName = await getChainName(client);
    const blockHash = this.options.at || (await getBlockHash(client));
    logger.info(`Connected to ${chainName} (${this.options.url}) at ${blockHash}`);

    const git = createGitRunner(this.options.repository);
    const { tag, fallback } = await resolveNodeVersion(client, blockHash, gitTagSource(git));
    logger.info(`Node version: ${tag}${fallback ? " (matched on spec version only)" : ""}`);

    if (this.options["tag-switch"]) {
      const { previousBranch, stashed } = await switchToTag(git, tag);
      logger.info(`Checked out ${tag}, previously on ${previousBranch || "detached HEAD"}`);
      if (stashed) {
        logger.warn(`Local changes were stashed, run "git stash pop" once back on ${previousBranch}`);
      }
    }
  }
}

await runTool({
  toolClass: GetNodeVersionTool,
  requiresApi: false,
  yargsOptions: {
    ...NETWORK_YARGS_OPTIONS,
    at: {
      type: "string",
      description: "Block hash (defaults to the best block)",
    },
    "tag-switch": {
      type: "boolean",
      description: "Check out the resolved tag",
      default: false,
    },
    repository: {
      type: "string",
      description: "Git repository of the node sources (defaults to the working directory)",
    },
  },
});
