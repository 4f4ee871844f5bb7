/**
 * CartStatusRegister
 *
 * Latest known state of the inspection cart. A single snapshot that every
 * update overwrites; reads before the first update return the offline
 * default.
 */

import { CartStatusRepository } from "../repositories/CartStatusRepository";
import { BroadcastHub } from "../queue/BroadcastHub";
import { CartStatusUpdate, CartStatusUpdateSchema } from "../types/results";
import { CartStatus } from "../types";
import { OperationResult, ValidationError, fail, guardPersistence, ok } from "../errors";

export function defaultCartStatus(timestamp: Date = new Date()): CartStatus {
  return {
    online: false,
    currentStation: null,
    mode: "idle",
    batteryLevel: null,
    lastActivity: null,
    timestamp,
  };
}

export class CartStatusRegister {
  private readonly repository: CartStatusRepository;
  private readonly hub: BroadcastHub;
  private readonly now: () => Date;

  constructor(repository: CartStatusRepository, hub: BroadcastHub, now: () => Date = () => new Date()) {
    this.repository = repository;
    this.hub = hub;
    this.now = now;
  }

  get(): OperationResult<CartStatus> {
    return guardPersistence("getCartStatus", () =>
      ok(this.repository.get() ?? defaultCartStatus(this.now()))
    );
  }

  /**
   * Overwrite the snapshot. lastActivity defaults to now.
   */
  update(input: CartStatusUpdate): OperationResult<CartStatus> {
    const parsed = CartStatusUpdateSchema.safeParse(input);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error, "cart status"));
    }

    const timestamp = this.now();
    const status: CartStatus = {
      online: parsed.data.online,
      currentStation: parsed.data.currentStation ?? null,
      mode: parsed.data.mode,
      batteryLevel: parsed.data.batteryLevel ?? null,
      lastActivity: parsed.data.lastActivity === undefined ? timestamp : parsed.data.lastActivity,
      timestamp,
    };

    return guardPersistence("updateCartStatus", () => {
      const saved = this.repository.save(status);
      this.hub.publish({ kind: "cart_status", payload: saved });
      return ok(saved);
    });
  }
}
