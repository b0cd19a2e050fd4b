/***
 *
 * SystemRegistry — The owner's list of systems and their lifecycle.
 *
 * Assigns SystemIDs, runs init/update/shutdown in registration order
 * (shutdown in reverse) and skips disabled or not-yet-initialised
 * systems during update.
 * A system is initialised at most once and only shut down if it was
 * initialised.
 *
 ***/

import type { Registry } from "../registry";
import { ECS_ERROR, ECSError } from "utils/error";
import { Logger } from "utils/logger";
import { as_system_id, type System, type SystemID } from "./system";

interface SystemEntry {
  readonly id: SystemID;
  readonly system: System;
  initialized: boolean;
}

//=========================================================
// SystemRegistry
//=========================================================

export class SystemRegistry {
  private entries: Map<SystemID, SystemEntry> = new Map();
  private ids: Map<System, SystemID> = new Map();
  private next_id = 0;

  /**
   * Add a system and assign it a SystemID. Registering the same
   * instance twice is a contract violation.
   */
  public register(system: System): SystemID {
    if (this.ids.has(system)) {
      throw new ECSError(
        ECS_ERROR.DUPLICATE_SYSTEM,
        `System "${system.name}" is already registered`,
      );
    }

    const id = as_system_id(this.next_id++);
    this.entries.set(id, { id, system, initialized: false });
    this.ids.set(system, id);
    return id;
  }

  public get(id: SystemID): System {
    const entry = this.entries.get(id);
    if (entry === undefined) {
      throw new ECSError(
        ECS_ERROR.SYSTEM_NOT_FOUND,
        `System with ID ${id} not found`,
      );
    }
    return entry.system;
  }

  public id_of(system: System): SystemID | undefined {
    return this.ids.get(system);
  }

  /**
   * Remove a system. Calls shutdown(registry) if it had been
   * initialised. No-op for an unknown ID.
   */
  public remove(id: SystemID, registry: Registry): void {
    const entry = this.entries.get(id);
    if (entry === undefined) return;

    if (entry.initialized) entry.system.shutdown(registry);
    this.entries.delete(id);
    this.ids.delete(entry.system);
  }

  /** Initialise every system not yet initialised. */
  public init_all(registry: Registry): void {
    for (const entry of this.entries.values()) {
      if (entry.initialized) continue;
      Logger.debug("systems", `init ${entry.system.name}`);
      entry.system.init(registry);
      entry.initialized = true;
    }
  }

  /**
   * Run one frame: update every enabled, initialised system in
   * registration order. A system registered after the last init_all()
   * waits for the next one.
   */
  public update_all(registry: Registry, delta_time: number): void {
    for (const entry of this.entries.values()) {
      if (!entry.initialized || !entry.system.enabled) continue;
      entry.system.update(registry, delta_time);
    }
  }

  /**
   * Shut down initialised systems in reverse registration order, then
   * forget them all.
   */
  public shutdown_all(registry: Registry): void {
    const entries = [...this.entries.values()];
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (!entry.initialized) continue;
      Logger.debug("systems", `shutdown ${entry.system.name}`);
      entry.system.shutdown(registry);
    }
    this.entries.clear();
    this.ids.clear();
  }

  public get_all(): System[] {
    return [...this.entries.values()].map((entry) => entry.system);
  }

  public get count(): number {
    return this.entries.size;
  }
}
