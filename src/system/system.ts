/***
 * System — Per-frame logic units that consume a Registry.
 *
 * A System is a thin polymorphic contract: one required update() and
 * optional init()/shutdown() hooks, plus an enabled flag so a system
 * can be paused without being removed. Systems hold no entity state of
 * their own; everything lives in the registry they are handed.
 *
 *   class MovementSystem extends System {
 *     update(registry: Registry, dt: number) {
 *       registry.view([TransformComponent, VelocityComponent], (_, t, v) => {
 *         t.position.x += v.linear.x * dt;
 *       });
 *     }
 *   }
 *
 * Plain functions work too, through define_system({ update }).
 *
 * Ordering between systems is the owner's concern; SystemRegistry runs
 * them in registration order.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { Registry } from "../registry";

export type SystemID = Brand<number, "system_id">;

export const as_system_id = (value: number) =>
  validate_and_cast<number, SystemID>(
    value,
    is_non_negative_integer,
    "SystemID must be a non-negative integer",
  );

export type SystemFn = (registry: Registry, delta_time: number) => void;

export abstract class System {
  private _enabled = true;
  public readonly name: string;

  constructor(name?: string) {
    this.name = name ?? this.constructor.name;
  }

  /** Called once before the first update. */
  public init(_registry: Registry): void {}

  /** Called once per frame/tick while enabled. `delta_time` is in seconds. */
  public abstract update(registry: Registry, delta_time: number): void;

  /** Called once when the owner unloads; release external resources here. */
  public shutdown(_registry: Registry): void {}

  public get enabled(): boolean {
    return this._enabled;
  }

  public set_enabled(enabled: boolean): void {
    this._enabled = enabled;
  }
}

export interface SystemConfig {
  update: SystemFn;
  name?: string;
  init?: (registry: Registry) => void;
  shutdown?: (registry: Registry) => void;
  /** Defaults to true. */
  enabled?: boolean;
}

class FunctionSystem extends System {
  constructor(private readonly config: SystemConfig) {
    super(config.name ?? (config.update.name || "anonymous_system"));
    if (config.enabled === false) this.set_enabled(false);
  }

  public override init(registry: Registry): void {
    this.config.init?.(registry);
  }

  public override update(registry: Registry, delta_time: number): void {
    this.config.update(registry, delta_time);
  }

  public override shutdown(registry: Registry): void {
    this.config.shutdown?.(registry);
  }
}

/** Build a System from plain functions. */
export function define_system(config: SystemConfig): System {
  return new FunctionSystem(config);
}
