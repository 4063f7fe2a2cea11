import { createApp } from "./app";
import { loadConfig } from "./config";
import { axiosFetchJson } from "./services/http-fetcher";
import { logger, setLogLevel } from "./services/logger";
import { ProvinceTable } from "./services/province-table";
import { createRng } from "./services/rng";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const provinces = await ProvinceTable.load(config.provinceTablePath);

  const configured = Object.entries(config.defaultKeys)
    .filter(([, key]) => Boolean(key))
    .map(([provider]) => provider);
  logger.info(
    `Default credentials: ${configured.length > 0 ? configured.join(", ") : "none"}`
  );

  const app = createApp({
    config,
    provinces,
    fetchJson: axiosFetchJson,
    rng: createRng(config.randomSeed),
  });

  // Start the server
  const server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`);
    logger.info(`API endpoints:`);
    logger.info(`- GET http://localhost:${config.port}/location/ip?ip={ip_address}`);
    logger.info(`- GET http://localhost:${config.port}/v3/ip?ip={ip_address}`);
    logger.info(`- GET http://localhost:${config.port}/health`);
  });

  // Clean shutdown function
  const shutdown = () => {
    logger.info("Shutting down gracefully...");
    server.close((err) => {
      if (err) {
        logger.error("Error during shutdown:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  // Listen for termination signals to close connections
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  logger.error("Failed to start server:", err);
  process.exit(1);
});
