import { ApiPromise } from "@polkadot/api";
import yargs, { type Options } from "yargs";
import { hideBin } from "yargs/helpers";
import { getApiFor } from "./networks.ts";
import { BaseTool, ToolError, type ToolContext } from "./base-tool.ts";
import { ConsoleLogger, type LogLevel } from "./logger.ts";

export interface CLIOptions extends Record<string, unknown> {
  url?: string;
  "log-level"?: LogLevel;
}

export interface RunToolOptions<T extends CLIOptions> {
  toolClass: new (options: T, context: ToolContext) => BaseTool;
  yargsOptions: Record<string, Options>;
  requiresApi?: boolean;
}

/**
 * CLI runner with top-level await support
 * Usage:
 * ```ts
 * await runTool({
 *   toolClass: MyTool,
 *   yargsOptions: {
 *     "base-spec": { type: "string", required: true }
 *   }
 * });
 * ```
 * Every option can also come from a JSON file given with --config.
 */
export async function runTool<T extends CLIOptions>(
  options: RunToolOptions<T>
): Promise<void> {
  // Parse CLI arguments
  const parsed = await yargs(hideBin(process.argv))
    .usage("Usage: $0 [options]")
    .options({
      "log-level": {
        type: "string",
        choices: ["debug", "info", "warn", "error"],
        default: "info",
        description: "Set the logging level",
      },
      ...options.yargsOptions,
    })
    .config("config", "JSON file providing any of the options")
    .help()
    .strict()
    .parse();
  const argv = parsed as T;

  // Create logger
  const logger = new ConsoleLogger({
    level: argv["log-level"] || "info",
  });

  // Create context
  const context: ToolContext = {
    logger,
  };

  let api: ApiPromise | undefined;

  try {
    // Connect to API if required
    if (options.requiresApi !== false) {
      logger.debug("Connecting to API...");
      const timeout = argv["rpc-timeout"];
      api = await getApiFor(argv, typeof timeout == "number" ? timeout : undefined);
      context.api = api;
      logger.debug("API connected");
    }

    // Create and run tool
    const tool = new options.toolClass(argv, context);
    await tool.run();

    // Exit successfully
    process.exitCode = 0;
  } catch (error) {
    logger.error("Tool execution failed:", error);
    process.exitCode = error instanceof ToolError ? error.code : 1;
  } finally {
    // The tool disconnects the API during its cleanup,
    // this only covers a tool that failed before running
    if (api?.isConnected) {
      await api.disconnect();
    }
  }
}
