/**
 * MCP server bootstrap.
 * Creates services, registers tools and wires the stdio transport and signal handling.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Build the services the tools operate on */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;

  /** Defaults to stdio */
  transport?: Transport;
}

/**
 * A connected server and the way to stop it.
 */
export interface RunningServer {
  server: McpServer;
  /** Runs onShutdown, then closes the server and its transport */
  close: () => Promise<void>;
}

/**
 * Create the server and its services, then connect.
 * With the default stdio transport, SIGTERM and SIGINT call close() and exit.
 * With an injected transport the caller owns shutdown through close().
 *
 * @example
 * ```typescript
 * const { close } = await bootstrapServer({
 *   config: { name: "agile-board", version: "0.1.0" },
 *   createServices: () => ({ board: new BoardService() }),
 *   registerTools: (server, services) => registerBoardTools(server, services.board),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<RunningServer> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const close = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
  };

  const transport = options.transport ?? new StdioServerTransport();

  if (!options.transport) {
    const onSignal = (): void => {
      close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error(`[${config.name}] Shutdown failed:`, error);
          process.exit(1);
        });
    };

    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
  }

  await onStartup?.(services);

  await server.connect(transport);

  return { server, close };
}

/**
 * Entry point for server scripts: bootstrap and exit on fatal errors.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
