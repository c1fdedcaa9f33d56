export { BaseTool, ToolError, type ToolContext, type ToolOptions } from "./utils/base-tool.ts";
export { runTool, type CLIOptions, type RunToolOptions } from "./utils/cli-runner.ts";
export { ConsoleLogger, logger, type Logger, type LogLevel } from "./utils/logger.ts";
export {
  NETWORK_YARGS_OPTIONS,
  createRpcClient,
  getApiFor,
  getRpcClientFactory,
} from "./utils/networks.ts";
export * from "./utils/constants.ts";
export * from "./utils/rpc.ts";
export * from "./utils/storage.ts";
export * from "./utils/types.ts";
export { WorkQueue } from "./utils/work-queue.ts";

export * from "./libs/helpers/state-manipulator/storage-keys.ts";
export * from "./libs/helpers/state-manipulator/allow-list.ts";
export * from "./libs/helpers/state-manipulator/chain-spec.ts";
export * from "./libs/helpers/state-manipulator/genesis-parser.ts";
export * from "./libs/helpers/state-manipulator/spec-merger.ts";
export { manipulateSpec, type SpecOptions } from "./libs/helpers/state-manipulator/spec-manipulator.ts";
export { SudoManipulator } from "./libs/helpers/state-manipulator/sudo-manipulator.ts";
export { RuntimeUpgradeManipulator } from "./libs/helpers/state-manipulator/runtime-upgrade-manipulator.ts";
export { ForceEraManipulator } from "./libs/helpers/state-manipulator/force-era-manipulator.ts";
export * from "./libs/helpers/git.ts";
export * from "./libs/helpers/modules.ts";
export * from "./libs/helpers/node-version.ts";
export * from "./libs/helpers/populate-base-chain.ts";
export * from "./libs/helpers/state-fork.ts";
