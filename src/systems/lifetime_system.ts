/***
 * LifetimeSystem — Counts LifetimeComponent down and destroys expired
 * entities.
 *
 * Expired IDs are collected during the walk and destroyed after it
 * returns, never from inside the callback.
 *
 ***/

import { System } from "../system/system";
import type { Registry } from "../registry";
import type { EntityID } from "../entity/entity";
import { LifetimeComponent } from "../components/gameplay";

export class LifetimeSystem extends System {
  private readonly expired: EntityID[] = [];

  public override update(registry: Registry, delta_time: number): void {
    registry.each(LifetimeComponent, (id, lifetime) => {
      lifetime.remaining -= delta_time;
      if (lifetime.remaining <= 0) this.expired.push(id);
    });

    for (let i = 0; i < this.expired.length; i++) {
      registry.destroy_entity(this.expired[i]);
    }
    this.expired.length = 0;
  }
}
