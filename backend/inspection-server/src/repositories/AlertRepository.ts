/**
 * AlertRepository
 *
 * Data access layer for the alert log. Alerts are created by result
 * ingestion and acknowledged by operators; nothing else changes them.
 */

import { desc, eq } from "drizzle-orm";
import { alertLog, AlertRow } from "../db/schema";
import { InspectionDatabase } from "../db/connection";
import { Alert, AlertLevel } from "../types";

export interface CreateAlertInput {
  recordId: number | null;
  level: AlertLevel;
  alertType: string;
  message: string;
  timestamp?: Date;
}

function rowToAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    recordId: row.recordId,
    level: row.level,
    alertType: row.alertType,
    message: row.message,
    handled: row.handled,
    timestamp: row.timestamp,
  };
}

export class AlertRepository {
  private db: InspectionDatabase;

  constructor(db: InspectionDatabase) {
    this.db = db;
  }

  /**
   * Insert an alert and return it
   */
  create(input: CreateAlertInput): Alert {
    const result = this.db
      .insert(alertLog)
      .values({
        recordId: input.recordId,
        level: input.level,
        alertType: input.alertType,
        message: input.message,
        handled: false,
        timestamp: input.timestamp ?? new Date(),
      })
      .run();

    const created = this.findById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error("Alert was not persisted");
    }
    return created;
  }

  findById(id: number): Alert | undefined {
    const row = this.db.select().from(alertLog).where(eq(alertLog.id, id)).get();
    return row ? rowToAlert(row) : undefined;
  }

  findByRecordId(recordId: number): Alert[] {
    return this.db
      .select()
      .from(alertLog)
      .where(eq(alertLog.recordId, recordId))
      .orderBy(desc(alertLog.id))
      .all()
      .map(rowToAlert);
  }

  /**
   * Unacknowledged alerts, newest first
   */
  findUnhandled(limit = 50): Alert[] {
    return this.db
      .select()
      .from(alertLog)
      .where(eq(alertLog.handled, false))
      .orderBy(desc(alertLog.timestamp), desc(alertLog.id))
      .limit(limit)
      .all()
      .map(rowToAlert);
  }

  /**
   * Returns true if the alert exists
   */
  markHandled(id: number): boolean {
    const result = this.db
      .update(alertLog)
      .set({ handled: true })
      .where(eq(alertLog.id, id))
      .run();
    return result.changes > 0;
  }
}
