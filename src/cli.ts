/**
 * Wiki Store CLI
 *
 * Usage:
 *   npm start                        Serve the store under $DATA_DIR (default ./data)
 *   npm start -- -d ./wiki -p 8080
 */

import { Command } from "commander";
import { createRequire } from "node:module";
import { serve } from "@hono/node-server";
import { z } from "zod";
import {
  assertDataDirectory,
  ConfigurationError,
  getConfigSummary,
  loadConfig,
  type ConfigOverrides,
} from "./config";
import { configureLogging, createLogger } from "./logging";
import { createWikiStore } from "./storage";
import { createWebServer } from "./web-server";
import { installShutdownHandlers, onShutdown } from "./api/shutdown";

const log = createLogger("cli");

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require("../package.json"));

interface ServeOptions {
  dir?: string;
  host?: string;
  port?: string;
}

async function serveCommand(options: ServeOptions): Promise<void> {
  const overrides: ConfigOverrides = {
    dataDir: options.dir,
    host: options.host,
    port: options.port,
  };
  const config = loadConfig(process.env, overrides);

  configureLogging({ level: config.logging.level, pretty: config.logging.pretty });
  await assertDataDirectory(config);

  const app = createWebServer({
    store: createWikiStore(config.data.dir),
    maxBodyBytes: config.server.maxBodyBytes,
    exposeErrors: config.isDevelopment,
  });

  const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    log.info("Wiki server listening", { address: info.address, port: info.port });
  });

  onShutdown("close-http-server", () => {
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });
  installShutdownHandlers(config.server.shutdownTimeoutMs);

  log.info("Configuration loaded", getConfigSummary(config));
}

const program = new Command();

program
  .name("wikistore")
  .description("Versioned, content-addressed wiki store with a small REST API")
  .version(version);

program
  .command("serve")
  .description("Serve the wiki store over HTTP")
  .option("-d, --dir <path>", "Store root directory (overrides DATA_DIR)")
  .option("-H, --host <host>", "Address to bind (overrides HOST)")
  .option("-p, --port <port>", "Port to listen on (overrides PORT)")
  .action(serveCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    log.error(err.message);
  } else {
    log.error("Failed to start", { error: err });
  }
  process.exit(1);
});
