/**
 * EventStreamBroadcaster
 *
 * Bridges BroadcastHub events to WebSocket clients on /ws/events.
 *
 * Design Notes:
 * - One hub subscription per client, so a slow client only loses itself
 * - A client whose socket buffer grows past maxBufferedBytes is dropped
 *   through the hub and its socket closed
 * - Each client may arm its own LockController with a "lock" message;
 *   it is disposed when the client goes away
 */

import { WebSocket, RawData } from "ws";
import { z } from "zod";
import { BroadcastEvent, BroadcastHub, Subscription } from "../queue/BroadcastHub";
import { LockController, LockState } from "../services/LockController";
import { TaskTypeSchema } from "../types/results";

export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

// WebSocket close codes
const CLOSE_POLICY_VIOLATION = 1008;
const CLOSE_GOING_AWAY = 1001;

/**
 * The part of a ws socket the broadcaster uses
 */
export interface EventSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close" | "error", listener: () => void): unknown;
}

/**
 * Message sent to WebSocket clients
 */
export interface StreamMessage {
  type: BroadcastEvent["kind"] | "connected" | "pong" | "lock_state" | "error";
  data?: unknown;
  timestamp: string;
}

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({
    type: z.literal("lock"),
    enabled: z.boolean(),
    taskTypes: z.array(TaskTypeSchema).optional(),
  }),
]);

export interface EventStreamBroadcasterOptions {
  hub: BroadcastHub;
  /** Factory for the per-client lock controller */
  createLockController: () => LockController;
  /** Socket buffer limit before a client is dropped (default: 1 MiB) */
  maxBufferedBytes?: number;
}

interface ClientConnection {
  socket: EventSocket;
  subscription: Subscription;
  lock?: LockController;
}

export class EventStreamBroadcaster {
  /** Map of client ID to connection info */
  private clients: Map<string, ClientConnection> = new Map();
  /** Counter for generating unique client IDs */
  private clientIdCounter: number = 0;
  private readonly hub: BroadcastHub;
  private readonly createLockController: () => LockController;
  private readonly maxBufferedBytes: number;

  constructor(options: EventStreamBroadcasterOptions) {
    this.hub = options.hub;
    this.createLockController = options.createLockController;
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  }

  /**
   * Register a new WebSocket client and send it the connected message
   *
   * @returns The client ID for this connection
   */
  addClient(socket: EventSocket): string {
    const clientId = `client-${++this.clientIdCounter}-${Date.now()}`;

    const subscription = this.hub.subscribe((event) => this.deliver(clientId, event), {
      onDrop: (error) => {
        console.warn(`[EventStream] Closing ${clientId}: ${error.message}`);
        this.closeClient(clientId, CLOSE_POLICY_VIOLATION, "event buffer overflow");
      },
    });

    this.clients.set(clientId, { socket, subscription });

    socket.on("message", (data) => {
      this.handleMessage(clientId, data.toString());
    });

    // Handle client disconnection
    socket.on("close", () => {
      this.removeClient(clientId);
    });

    socket.on("error", () => {
      this.removeClient(clientId);
    });

    this.sendToClient(clientId, {
      type: "connected",
      data: { clientId },
      timestamp: new Date().toISOString(),
    });

    return clientId;
  }

  /**
   * Remove a client, its hub subscription and its lock controller
   */
  removeClient(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;

    client.subscription.unsubscribe();
    client.lock?.dispose();
    this.clients.delete(clientId);
  }

  /**
   * Handle a raw message from a client
   */
  handleMessage(clientId: string, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.sendError(clientId, "Invalid message format. Expected JSON.");
      return;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.sendError(clientId, "Unknown message. Expected type ping or lock.");
      return;
    }

    const message = parsed.data;
    if (message.type === "ping") {
      this.sendToClient(clientId, { type: "pong", timestamp: new Date().toISOString() });
      return;
    }

    const client = this.clients.get(clientId);
    if (!client) return;

    if (!message.enabled) {
      const state = client.lock?.disarm() ?? { enabled: false, lockedTaskTypes: [] };
      this.sendLockState(clientId, state);
      return;
    }

    if (!client.lock) {
      client.lock = this.createLockController();
    }
    const armed = client.lock.arm(message.taskTypes);
    if (!armed.success) {
      this.sendError(clientId, armed.error.message);
      return;
    }
    this.sendLockState(clientId, armed.value);
  }

  /**
   * Get the total number of connected clients
   */
  getClientCount(): number {
    return this.clients.size;
  }

  getLockState(clientId: string): LockState | undefined {
    return this.clients.get(clientId)?.lock?.getState();
  }

  /**
   * Close all connections and clean up
   */
  dispose(): void {
    for (const clientId of [...this.clients.keys()]) {
      this.closeClient(clientId, CLOSE_GOING_AWAY, "server shutting down");
    }
  }

  private deliver(clientId: string, event: BroadcastEvent): void {
    const client = this.clients.get(clientId);
    if (!client || client.socket.readyState !== WebSocket.OPEN) return;

    if (client.socket.bufferedAmount > this.maxBufferedBytes) {
      // onDrop closes the socket
      this.hub.disconnect(
        client.subscription.id,
        `socket buffer above ${this.maxBufferedBytes} bytes`
      );
      return;
    }

    this.sendToClient(clientId, {
      type: event.kind,
      data: event.payload,
      timestamp: event.timestamp.toISOString(),
    });
  }

  private closeClient(clientId: string, code: number, reason: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;
    this.removeClient(clientId);
    client.socket.close(code, reason);
  }

  private sendLockState(clientId: string, state: LockState): void {
    this.sendToClient(clientId, {
      type: "lock_state",
      data: state,
      timestamp: new Date().toISOString(),
    });
  }

  private sendError(clientId: string, error: string): void {
    this.sendToClient(clientId, {
      type: "error",
      data: { error },
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Send a message to a specific client
   */
  private sendToClient(clientId: string, message: StreamMessage): void {
    const client = this.clients.get(clientId);
    if (client && client.socket.readyState === WebSocket.OPEN) {
      client.socket.send(JSON.stringify(message));
    }
  }
}
