// Entry point for the site.

import "dotenv/config";
import { bootstrap } from "./bootstrap";
import { loadConfig } from "./config";
import { errorFields, log } from "./logger";

async function main(): Promise<void> {
  log("info", "Starting site");

  const config = loadConfig();

  log("info", "Configuration loaded", {
    port: config.port,
    debug: config.debug,
    settings_file: config.settingsFile ?? null,
    chat_provider: config.completion.provider,
    chat_model: config.completion.model,
    timeout_ms: config.completion.timeoutMs,
    email_transport: config.mail.transport,
  });

  const { server, deps } = await bootstrap(config);
  await server.start();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log("info", `Received ${signal}, shutting down gracefully`);
    await server.stop();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  // Lets an operator fix a missing key without a restart.
  process.on("SIGHUP", () => deps.cache.reset());
}

main().catch((err: unknown) => {
  log("error", "Fatal error starting site", errorFields(err));
  process.exit(1);
});
