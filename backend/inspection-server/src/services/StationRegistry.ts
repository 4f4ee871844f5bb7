/**
 * StationRegistry
 *
 * Optional station → task type binding loaded from a YAML file.
 *
 * The registry is advisory: a station it lists must be enqueued with its
 * bound task type, while stations it does not list are accepted as-is.
 *
 * File format:
 * ```yaml
 * stations:
 *   - id: 1
 *     task_type: 2
 *     name: Transformer room
 * ```
 *
 * Usage:
 *   const registry = StationRegistry.fromFile("./config/stations.yml");
 *   registry.checkBinding(1, 2); // undefined when allowed, else a reason
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { StationConfigError } from "../errors";
import { TaskTypeSchema, StationIdSchema } from "../types/results";
import { TaskType, TASK_TYPE_NAMES } from "../types";

export interface StationDefinition {
  id: number;
  taskType: TaskType;
  name?: string;
}

/**
 * Zod schema for the registry YAML structure (snake_case, as written on disk)
 */
const StationsYamlSchema = z.object({
  stations: z
    .array(
      z.object({
        id: StationIdSchema,
        task_type: TaskTypeSchema,
        name: z.string().optional(),
      })
    )
    .default([]),
});

export class StationRegistry {
  private readonly stations: Map<number, StationDefinition>;

  constructor(stations: StationDefinition[] = []) {
    this.stations = new Map();
    for (const station of stations) {
      if (this.stations.has(station.id)) {
        throw new Error(`Station ${station.id} is defined more than once`);
      }
      this.stations.set(station.id, station);
    }
  }

  /**
   * Load and validate a registry file.
   *
   * @throws StationConfigError if the file is missing, unreadable or malformed
   */
  static fromFile(filePath: string): StationRegistry {
    const resolved = path.resolve(filePath);

    let raw: unknown;
    try {
      raw = parseYaml(fs.readFileSync(resolved, "utf-8"));
    } catch (error) {
      throw new StationConfigError(resolved, error instanceof Error ? error.message : String(error));
    }

    const parsed = StationsYamlSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issueList = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new StationConfigError(resolved, issueList);
    }

    try {
      return new StationRegistry(
        parsed.data.stations.map((s) => ({ id: s.id, taskType: s.task_type, name: s.name }))
      );
    } catch (error) {
      throw new StationConfigError(resolved, error instanceof Error ? error.message : String(error));
    }
  }

  get(stationId: number): StationDefinition | undefined {
    return this.stations.get(stationId);
  }

  list(): StationDefinition[] {
    return [...this.stations.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * @returns undefined when the pair is allowed, otherwise the reason it is not
   */
  checkBinding(stationId: number, taskType: TaskType): string | undefined {
    const station = this.stations.get(stationId);
    if (!station || station.taskType === taskType) {
      return undefined;
    }
    return (
      `Station ${stationId} is bound to task type ${station.taskType} ` +
      `(${TASK_TYPE_NAMES[station.taskType]}), not ${taskType}`
    );
  }
}
