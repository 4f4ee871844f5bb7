/**
 * CartStatusRepository
 *
 * The cart status table holds at most one row (id = 1) that every update
 * overwrites.
 */

import { eq } from "drizzle-orm";
import { cartStatus, CartStatusRow } from "../db/schema";
import { InspectionDatabase } from "../db/connection";
import { CartStatus } from "../types";

const SINGLETON_ID = 1;

function rowToCartStatus(row: CartStatusRow): CartStatus {
  return {
    online: row.online,
    currentStation: row.currentStation,
    mode: row.mode,
    batteryLevel: row.batteryLevel,
    lastActivity: row.lastActivity,
    timestamp: row.timestamp,
  };
}

export class CartStatusRepository {
  private db: InspectionDatabase;

  constructor(db: InspectionDatabase) {
    this.db = db;
  }

  get(): CartStatus | undefined {
    const row = this.db.select().from(cartStatus).where(eq(cartStatus.id, SINGLETON_ID)).get();
    return row ? rowToCartStatus(row) : undefined;
  }

  /**
   * Insert or overwrite the singleton row
   */
  save(status: CartStatus): CartStatus {
    const values = {
      online: status.online,
      currentStation: status.currentStation,
      mode: status.mode,
      batteryLevel: status.batteryLevel,
      lastActivity: status.lastActivity,
      timestamp: status.timestamp,
    };

    this.db
      .insert(cartStatus)
      .values({ id: SINGLETON_ID, ...values })
      .onConflictDoUpdate({ target: cartStatus.id, set: values })
      .run();

    return status;
  }
}
