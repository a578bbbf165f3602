import type { Logger } from "./logger";
import type { JsonRpcClient } from "./rpc";
import { ToolError } from "./errors";

export interface ToolOptions {
  name: string;
  description?: string;
}

export interface ToolContext {
  rpc?: JsonRpcClient;
  logger: Logger;
}

let errorHandlersInstalled = false;

export abstract class BaseTool {
  protected readonly name: string;
  protected readonly description?: string;
  protected context: ToolContext;

  constructor(options: ToolOptions, context: ToolContext) {
    this.name = options.name;
    this.description = options.description;
    this.context = context;

    this.setupErrorHandlers();
  }

  /**
   * Abstract method that must be implemented by each tool
   */
  abstract execute(): Promise<void>;

  /**
   * Main entry point for the tool with error handling
   */
  async run(): Promise<void> {
    const startTime = Date.now();

    try {
      this.context.logger.info(`Starting ${this.name}${this.description ? `: ${this.description}` : ""}`);
      await this.execute();
      this.context.logger.info(`${this.name} completed successfully in ${Date.now() - startTime}ms`);
    } catch (error) {
      this.context.logger.error(`${this.name} failed:`, error instanceof ToolError ? error.message : error);
      throw error;
    }
  }

  private setupErrorHandlers(): void {
    if (errorHandlersInstalled) {
      return;
    }
    errorHandlersInstalled = true;

    const handleError = (error: unknown, origin: string): void => {
      this.context.logger.error(`Unhandled error from ${origin}:`, error);
      // Don't use process.exit, let Node.js exit naturally
      process.exitCode = 1;
    };

    process.on("uncaughtException", (error) => handleError(error, "uncaughtException"));
    process.on("unhandledRejection", (error) => handleError(error, "unhandledRejection"));
  }

  protected ensureRpc(): JsonRpcClient {
    if (!this.context.rpc) {
      throw new ToolError("RPC client not initialized");
    }
    return this.context.rpc;
  }
}
