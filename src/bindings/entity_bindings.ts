/***
 * EntityBindings — The flat entity API a scripting bridge exposes.
 *
 * Every call works on the registry of the currently bound context.
 * Handles arrive as plain numbers from the other side of the bridge and
 * are validated here; an invalid, dead or stale handle, or an unbound
 * context, turns the call into a no-op or a default answer (0, "",
 * false, a zero vector, INVALID_ENTITY). Mutating calls made while
 * unbound also log a warning. Nothing here throws for those cases.
 *
 * Values come back by copy, never as references into pool storage.
 *
 *   const bindings = new EntityBindings();
 *   bindings.bind({ registry: scene.registry, local_player: player });
 *   const id = bindings.create();
 *   bindings.set_pos(id, 0, 1, 0);
 *   ...
 *   bindings.unbind(); // during scene transitions
 *
 ***/

import type { Registry } from "../registry";
import type { ComponentType } from "../component/component";
import {
  INVALID_ENTITY,
  is_valid_entity_id,
  type EntityID,
} from "../entity/entity";
import { unsafe_cast } from "type_primitives";
import {
  TransformComponent,
  VelocityComponent,
  vec3,
  type Vector3,
} from "../components/spatial";
import { TagComponent } from "../components/identity";
import {
  HealthComponent,
  LifetimeComponent,
  PlayerComponent,
  type PlayerController,
} from "../components/gameplay";
import { DEFAULT_NUMBER } from "utils/constants";
import { Logger } from "utils/logger";

const LOG_CONTEXT = "bindings";

/** The active registry and local player the bindings operate on. */
export interface BindingContext {
  registry: Registry | null;
  local_player: PlayerController | null;
}

export interface HealthReading {
  current: number;
  max: number;
}

export class EntityBindings {
  private context: BindingContext | null = null;

  public bind(context: BindingContext): void {
    this.context = context;
  }

  public unbind(): void {
    this.context = null;
  }

  public get is_bound(): boolean {
    return this.context?.registry != null;
  }

  //=========================================================
  // Entity lifecycle
  //=========================================================

  public create(): number {
    const registry = this.registry_for("create");
    if (registry === null) return INVALID_ENTITY;
    return registry.create_entity();
  }

  public destroy(handle: number): void {
    const registry = this.registry_for("destroy");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id !== null) registry.destroy_entity(id);
  }

  public is_alive(handle: number): boolean {
    const registry = this.context?.registry ?? null;
    return registry !== null && this.live_id(registry, handle) !== null;
  }

  //=========================================================
  // Transform
  //=========================================================

  /** Teleports the linked engine player too, when there is one. */
  public set_pos(handle: number, x: number, y: number, z: number): void {
    const registry = this.registry_for("set_pos");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;

    const player = registry.try_get_component(id, PlayerComponent)?.player;
    if (player) player.position = vec3(x, y, z);

    registry.get_or_add(id, TransformComponent).position = vec3(x, y, z);
  }

  /** The linked player's live position first, then the transform. */
  public get_pos(handle: number): Vector3 {
    const registry = this.context?.registry ?? null;
    if (registry === null) return vec3();
    const id = this.live_id(registry, handle);
    if (id === null) return vec3();

    const player = registry.try_get_component(id, PlayerComponent)?.player;
    if (player) return copy(player.position);

    const transform = registry.try_get_component(id, TransformComponent);
    return transform ? copy(transform.position) : vec3();
  }

  public set_scale(handle: number, x: number, y: number, z: number): void {
    const registry = this.registry_for("set_scale");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;
    registry.get_or_add(id, TransformComponent).scale = vec3(x, y, z);
  }

  public set_velocity(handle: number, x: number, y: number, z: number): void {
    const registry = this.registry_for("set_velocity");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;
    registry.get_or_add(id, VelocityComponent).linear = vec3(x, y, z);
  }

  public get_velocity(handle: number): Vector3 {
    const velocity = this.read(handle, VelocityComponent);
    return velocity ? copy(velocity.linear) : vec3();
  }

  //=========================================================
  // Tag
  //=========================================================

  public set_tag(handle: number, name: string): void {
    const registry = this.registry_for("set_tag");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;
    registry.get_or_add(id, TagComponent).name = name;
  }

  public get_tag(handle: number): string {
    return this.read(handle, TagComponent)?.name ?? "";
  }

  //=========================================================
  // Health
  //=========================================================

  /** Add or reset health so that current === max === max_hp. */
  public add_health(handle: number, max_hp: number): void {
    const registry = this.registry_for("add_health");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;

    const health = registry.get_or_add(id, HealthComponent);
    health.max = max_hp;
    health.current = max_hp;
  }

  public get_health(handle: number): HealthReading {
    const health = this.read(handle, HealthComponent);
    return health
      ? { current: health.current, max: health.max }
      : { current: DEFAULT_NUMBER, max: DEFAULT_NUMBER };
  }

  public damage(handle: number, amount: number): void {
    if (this.registry_for("damage") === null) return;
    this.read(handle, HealthComponent)?.apply_damage(amount);
  }

  public heal(handle: number, amount: number): void {
    if (this.registry_for("heal") === null) return;
    this.read(handle, HealthComponent)?.heal(amount);
  }

  /** False for an entity without health, not just for a living one. */
  public is_dead(handle: number): boolean {
    return this.read(handle, HealthComponent)?.is_dead() ?? false;
  }

  //=========================================================
  // Lifetime
  //=========================================================

  public set_lifetime(handle: number, seconds: number): void {
    const registry = this.registry_for("set_lifetime");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;
    registry.get_or_add(id, LifetimeComponent).remaining = seconds;
  }

  public get_lifetime(handle: number): number {
    return this.read(handle, LifetimeComponent)?.remaining ?? DEFAULT_NUMBER;
  }

  //=========================================================
  // Player controller (opt-in, never added implicitly)
  //=========================================================

  /**
   * Link the entity to the bound local player. Leaves an existing link
   * alone, and makes sure the entity has a transform for get_pos.
   */
  public add_player(handle: number): void {
    const registry = this.registry_for("add_player");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id === null) return;

    if (!registry.has_component(id, PlayerComponent)) {
      const player = this.context?.local_player ?? null;
      registry.add_component(
        id,
        PlayerComponent,
        player,
        player?.enable_source_bhop ?? false,
      );
    }
    registry.get_or_add(id, TransformComponent);
  }

  public has_player(handle: number): boolean {
    return this.read(handle, PlayerComponent) !== undefined;
  }

  public remove_player(handle: number): void {
    const registry = this.registry_for("remove_player");
    if (registry === null) return;
    const id = this.live_id(registry, handle);
    if (id !== null) registry.remove_component(id, PlayerComponent);
  }

  public set_player_bhop(handle: number, enabled: boolean): void {
    if (this.registry_for("set_player_bhop") === null) return;
    const link = this.read(handle, PlayerComponent);
    if (link === undefined) return;

    link.enable_source_bhop = enabled;
    link.player?.set_source_bhop_enabled(enabled);
  }

  //=========================================================
  // Internal
  //=========================================================

  private registry_for(operation: string): Registry | null {
    const registry = this.context?.registry ?? null;
    if (registry === null) {
      Logger.warn(LOG_CONTEXT, `Registry not bound, ${operation} ignored`);
    }
    return registry;
  }

  private live_id(registry: Registry, handle: number): EntityID | null {
    if (!is_valid_entity_id(handle)) return null;
    const id = unsafe_cast<EntityID>(handle);
    return registry.is_alive(id) ? id : null;
  }

  /** The component on a live entity of the bound registry, if any. */
  private read<T>(
    handle: number,
    type: ComponentType<T>,
  ): T | undefined {
    const registry = this.context?.registry ?? null;
    if (registry === null) return undefined;
    const id = this.live_id(registry, handle);
    return id === null ? undefined : registry.try_get_component(id, type);
  }
}

const copy = (v: Vector3): Vector3 => vec3(v.x, v.y, v.z);
