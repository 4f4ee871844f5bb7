/**
 * Fastify Server with TRPC Integration and WebSocket Support
 *
 * HTTP server providing:
 * - /health endpoint for health checks
 * - /trpc/* endpoints for TRPC API
 * - /api/* REST endpoints for the cart and the vision service
 * - /ws/events WebSocket endpoint for real-time inspection events
 * - CORS support for cross-origin requests
 */

import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { fastifyTRPCPlugin, FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { appRouter, createContext, AppRouter } from "./trpc";
import { registerRestRoutes } from "./rest";
import { EventStreamBroadcaster } from "./EventStreamBroadcaster";
import { InspectionServices } from "../app";

export interface ServerOptions {
  /** Port to listen on (default: 5000) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Enable request logging (default: true) */
  logger?: boolean;
  /** WebSocket send buffer limit per client */
  wsMaxBufferedBytes?: number;
}

export interface InspectionServer {
  server: FastifyInstance;
  broadcaster: EventStreamBroadcaster;
}

/**
 * Create and configure a Fastify server over the given services
 */
export async function createServer(
  services: InspectionServices,
  options: ServerOptions = {}
): Promise<InspectionServer> {
  const { logger = true, wsMaxBufferedBytes } = options;

  const server = Fastify({ logger });
  const broadcaster = new EventStreamBroadcaster({
    hub: services.hub,
    createLockController: services.createLockController,
    maxBufferedBytes: wsMaxBufferedBytes,
  });

  // Register CORS
  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    credentials: true,
  });

  // Register WebSocket plugin
  await server.register(websocket);

  // Health check endpoint
  server.get("/health", async () => {
    return {
      status: "ok",
      clients: broadcaster.getClientCount(),
      timestamp: new Date().toISOString(),
    };
  });

  // WebSocket endpoint for inspection events
  server.get("/ws/events", { websocket: true }, (socket) => {
    broadcaster.addClient(socket);
  });

  // Register TRPC plugin
  await server.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: appRouter,
      createContext: () => createContext(services),
      onError: ({ path, error }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          console.error(`TRPC Error on ${path}:`, error);
        }
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>["trpcOptions"],
  });

  // Register REST API routes at /api/*
  await registerRestRoutes(server, createContext(services));

  server.addHook("onClose", async () => {
    broadcaster.dispose();
  });

  return { server, broadcaster };
}

/**
 * Start the server and listen on the specified port
 */
export async function startServer(
  services: InspectionServices,
  options: ServerOptions = {}
): Promise<InspectionServer> {
  const { port = 5000, host = "0.0.0.0" } = options;

  const created = await createServer(services, options);

  try {
    const address = await created.server.listen({ port, host });
    console.log(`Server listening at ${address}`);
    return created;
  } catch (err) {
    created.server.log.error(err);
    throw err;
  }
}
