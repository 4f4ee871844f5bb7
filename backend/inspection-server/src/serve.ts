/**
 * Server Entry Point
 *
 * Loads configuration from the environment, opens the database and starts
 * the Fastify server. Can be run directly with: tsx src/serve.ts
 */

import { startServer } from "./api";
import { createInspectionServices } from "./app";
import { ConfigError, loadConfig, ServerConfig } from "./config";
import { openDatabase } from "./db/connection";
import { StationRegistry } from "./services";
import { StationConfigError } from "./errors";

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

function readStations(stationsPath: string | undefined): StationRegistry | undefined {
  if (!stationsPath) {
    return undefined;
  }
  try {
    const registry = StationRegistry.fromFile(stationsPath);
    console.log(`Loaded ${registry.list().length} station(s) from ${stationsPath}`);
    return registry;
  } catch (err) {
    if (err instanceof StationConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
const stations = readStations(config.stationsPath);

const handle = openDatabase(config.dbPath);
console.log(`Database: ${config.dbPath}`);

const services = createInspectionServices(handle, {
  stations,
  subscriberBuffer: config.subscriberBuffer,
  lockDebounceMs: config.lockDebounceMs,
  temperatureThresholds: config.temperatureThresholds,
});

console.log(
  `Thresholds: warning=${config.temperatureThresholds.warning}°C danger=${config.temperatureThresholds.danger}°C, lockDebounceMs=${config.lockDebounceMs}`
);

const started = startServer(services, {
  port: config.port,
  host: config.host,
  logger: config.logger,
  wsMaxBufferedBytes: config.wsMaxBufferedBytes,
});

// Graceful shutdown handler
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`\n${signal} received, initiating graceful shutdown...`);

  try {
    const { server } = await started;
    // Closes WebSocket clients through the onClose hook
    await server.close();
    await services.hub.flush();
    services.close();

    console.log("Shutdown complete");
    process.exit(0);
  } catch (err) {
    console.error("Error during shutdown:", err);
    process.exit(1);
  }
}

// Register signal handlers
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

started
  .then(() => {
    console.log(`Server started on http://${config.host}:${config.port}`);
    console.log(`Health check: http://${config.host}:${config.port}/health`);
    console.log(`TRPC endpoint: http://${config.host}:${config.port}/trpc`);
    console.log(`REST API: http://${config.host}:${config.port}/api`);
    console.log(`Event stream: ws://${config.host}:${config.port}/ws/events`);
  })
  .catch((err) => {
    console.error("Failed to start server:", err);
    services.close();
    process.exit(1);
  });
