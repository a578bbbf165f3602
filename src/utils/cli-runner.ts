import yargs, { type Options } from "yargs";
import { hideBin } from "yargs/helpers";
import { BaseTool, type ToolContext } from "./base-tool";
import { resolveRpcUrl, RPC_YARGS_OPTIONS, type RpcArgv } from "./chains";
import { exitCodeOf } from "./errors";
import { ConsoleLogger, isLogLevel, LOG_LEVEL_NAMES } from "./logger";
import { JsonRpcClient } from "./rpc";

export interface CLIOptions extends RpcArgv {
  "log-level"?: string;
}

export interface RunToolOptions<T extends CLIOptions> {
  toolClass: new (options: T, context: ToolContext) => BaseTool;
  yargsOptions: Record<string, Options>;
  /** turns the raw yargs output into the tool's options, rejecting bad input */
  parseOptions: (argv: Record<string, unknown>) => T;
  requiresRpc?: boolean;
  argv?: string[];
}

/**
 * CLI runner with top-level await support
 * Usage:
 * ```ts
 * await runTool({
 *   toolClass: MyTool,
 *   yargsOptions: {
 *     address: { type: "string", demandOption: true }
 *   },
 *   parseOptions: (argv) => ({ address: String(argv.address) }),
 * });
 * ```
 */
const envLevel = process.env.LOG_LEVEL;

export async function runTool<T extends CLIOptions>(options: RunToolOptions<T>): Promise<void> {
  const argv: Record<string, unknown> = await yargs(options.argv ?? hideBin(process.argv))
    .usage("Usage: $0 [options]")
    .options({
      "log-level": {
        type: "string",
        choices: LOG_LEVEL_NAMES,
        default: isLogLevel(envLevel) ? envLevel : "info",
        description: "Set the logging level (defaults to $LOG_LEVEL)",
      },
      ...(options.requiresRpc !== false ? RPC_YARGS_OPTIONS : {}),
      ...options.yargsOptions,
    })
    .help()
    .strict()
    .parse();

  const level = argv["log-level"];
  const logger = new ConsoleLogger({
    level: isLogLevel(level) ? level : "info",
  });

  try {
    const toolOptions = options.parseOptions(argv);
    const context: ToolContext = { logger };

    if (options.requiresRpc !== false) {
      const url = resolveRpcUrl(toolOptions);
      logger.debug(`Using RPC ${url}`);
      context.rpc = new JsonRpcClient({ url, timeoutMs: toolOptions.timeout });
    }

    const tool = new options.toolClass(toolOptions, context);
    await tool.run();

    process.exitCode = 0;
  } catch (error) {
    logger.error("Tool execution failed:", error);
    process.exitCode = exitCodeOf(error);
  }
}
