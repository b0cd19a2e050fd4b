/***
 * Registry — Public ECS facade.
 *
 * Owns the slot table and one sparse-set pool per component class, and
 * is the only surface through which entities and components change.
 * Pools are created lazily the first time a component class is used.
 *
 * Usage:
 *
 *   const registry = new Registry();
 *
 *   const e = registry.create_entity();
 *   registry.add_component(e, TransformComponent);
 *   registry.add_component(e, VelocityComponent, { x: 0, y: 0, z: 5 });
 *
 *   registry.view([TransformComponent, VelocityComponent], (id, t, v) => {
 *     t.position.x += v.linear.x * dt;
 *   });
 *
 *   registry.destroy_entity(e); // strips every component
 *
 * Failure model: asking about something absent (dead entity, missing
 * component, never-used type) is a no-op or a false/undefined answer.
 * Breaking a precondition (adding twice, reading what isn't there,
 * touching a dead entity through a mutating call) throws an ECSError
 * in dev builds and is undefined behaviour in production bundles.
 *
 * Mutation during each()/view(): creating and destroying entities is
 * safe; the query works from a snapshot of IDs taken before the first
 * callback and re-checks every ID before visiting it, so an entity that
 * lost a queried component before its turn is skipped. Adding one of
 * the *queried* component types inside the callback is not supported:
 * collect the IDs and add after the query returns.
 *
 * Not thread-safe; the registry does no locking of any kind.
 *
 ***/

import {
  type EntityID,
  get_entity_index,
} from "./entity/entity";
import { EntityRegistry } from "./entity/entity_registry";
import {
  component_name,
  type ComponentClass,
  type ComponentType,
  type ComponentsOf,
  type DefaultConstructible,
} from "./component/component";
import {
  ComponentPool,
  is_pool_of,
  type ErasedPool,
} from "./pool/component_pool";
import { ECS_ERROR, ECSError } from "utils/error";
import { DEFAULT_INITIAL_CAPACITY } from "utils/constants";

export interface RegistryOptions {
  /** Initial slot-table and per-pool sparse capacity. */
  initial_capacity?: number;
}

export type EachFn<T> = (id: EntityID, component: T) => void;

export type ViewFn<Types extends readonly ComponentType[]> = (
  id: EntityID,
  ...components: ComponentsOf<Types>
) => void;

export class Registry {
  private readonly slots: EntityRegistry;
  // One pool per component class, in first-use order
  private readonly pools: Map<ComponentType, ErasedPool> = new Map();
  private readonly initial_capacity: number;

  constructor(options?: RegistryOptions) {
    this.initial_capacity =
      options?.initial_capacity ?? DEFAULT_INITIAL_CAPACITY;
    this.slots = new EntityRegistry(this.initial_capacity);
  }

  //=========================================================
  // Entity lifecycle
  //=========================================================

  /** Create an entity, reusing the oldest freed slot when there is one. */
  public create_entity(): EntityID {
    return this.slots.create();
  }

  /**
   * Destroy an entity: strip it from every pool, then bump its slot's
   * generation and queue the slot for reuse. No-op for a dead or stale ID.
   */
  public destroy_entity(id: EntityID): void {
    if (!this.slots.is_alive(id)) return;

    const index = get_entity_index(id);
    for (const pool of this.pools.values()) {
      pool.remove(index);
    }
    this.slots.destroy(id);
  }

  public is_alive(id: EntityID): boolean {
    return this.slots.is_alive(id);
  }

  /** Snapshot of every live entity. Order is not guaranteed. */
  public get entities(): EntityID[] {
    return this.slots.alive_ids();
  }

  public get entity_count(): number {
    return this.slots.count;
  }

  /**
   * Destroy every entity and drop every pool. Afterwards the registry
   * behaves as if freshly constructed.
   */
  public clear(): void {
    for (const pool of this.pools.values()) {
      pool.clear();
    }
    this.pools.clear();
    this.slots.clear();
  }

  //=========================================================
  // Component access
  //=========================================================

  /**
   * Construct `new type(...args)` on a living entity and return it.
   * The returned object is a borrow: see the header on relocation.
   */
  public add_component<T, A extends unknown[]>(
    id: EntityID,
    type: ComponentClass<T, A>,
    ...args: A
  ): T {
    this.assert_alive(id, type);
    return this.pool(type).emplace(get_entity_index(id), new type(...args));
  }

  /** Attach an already-built component instance to a living entity. */
  public insert_component<T>(
    id: EntityID,
    type: ComponentType<T>,
    value: T,
  ): T {
    this.assert_alive(id, type);
    return this.pool(type).emplace(get_entity_index(id), value);
  }

  /** False for dead or stale IDs, and for classes never used. */
  public has_component(id: EntityID, type: ComponentType): boolean {
    if (!this.slots.is_alive(id)) return false;
    const pool = this.pools.get(type);
    return pool !== undefined && pool.has(get_entity_index(id));
  }

  /** The entity's component. The entity must be alive and own one. */
  public get_component<T>(id: EntityID, type: ComponentType<T>): T {
    this.assert_alive(id, type);
    const pool = this.try_pool(type);
    if (pool === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_PRESENT,
        `No entity owns ${component_name(type)}`,
        { entity: id, component: component_name(type) },
      );
    }
    return pool.get(get_entity_index(id));
  }

  /** The entity's component, or undefined when dead, stale or absent. */
  public try_get_component<T>(
    id: EntityID,
    type: ComponentType<T>,
  ): T | undefined {
    if (!this.slots.is_alive(id)) return undefined;
    return this.try_pool(type)?.try_get(get_entity_index(id));
  }

  /** No-op when the entity is dead or doesn't own the component. */
  public remove_component(id: EntityID, type: ComponentType): void {
    if (!this.slots.is_alive(id)) return;
    this.pools.get(type)?.remove(get_entity_index(id));
  }

  /** The existing component, or a default-constructed one added now. */
  public get_or_add<T>(id: EntityID, type: DefaultConstructible<T>): T {
    this.assert_alive(id, type);
    const pool = this.pool(type);
    const index = get_entity_index(id);
    return pool.has(index) ? pool.get(index) : pool.emplace(index, new type());
  }

  //=========================================================
  // Queries
  //=========================================================

  /**
   * Visit every entity owning `type`, in dense order.
   *
   * IDs are captured before the first callback; each is re-checked for
   * aliveness and ownership when its turn comes. Entities created during
   * the walk are never visited, even when they reuse a destroyed slot.
   */
  public each<T>(type: ComponentType<T>, fn: EachFn<T>): void {
    const pool = this.try_pool(type);
    if (pool === undefined || pool.size === 0) return;

    const snapshot = this.snapshot_ids(pool);
    for (let i = 0; i < snapshot.length; i++) {
      const id = snapshot[i];
      if (!this.slots.is_alive(id)) continue;
      const index = get_entity_index(id);
      if (!pool.has(index)) continue;
      fn(id, pool.get(index));
    }
  }

  /**
   * Visit every entity owning all of `types`, passing the components in
   * argument order.
   *
   * Iteration is driven by the smallest pool (the first one listed wins
   * a tie), testing membership in the others per entity, so a rare
   * component keeps the walk short however common the rest are. If any
   * listed class has never been used there is nothing to visit.
   */
  public view<const Types extends readonly ComponentType[]>(
    types: Types,
    fn: ViewFn<Types>,
  ): void {
    if (__DEV__ && types.length === 0) {
      throw new ECSError(
        ECS_ERROR.EMPTY_VIEW,
        "view() needs at least one component type",
      );
    }

    const pools: ComponentPool<unknown>[] = new Array(types.length);
    let driver: ComponentPool<unknown> | undefined;
    for (let i = 0; i < types.length; i++) {
      const pool = this.try_pool(types[i]);
      if (pool === undefined) return;
      pools[i] = pool;
      if (driver === undefined || pool.size < driver.size) driver = pool;
    }
    if (driver === undefined || driver.size === 0) return;

    const snapshot = this.snapshot_ids(driver);
    // Holds [id, component0, component1, ...] for each visit
    const args: unknown[] = new Array(types.length + 1);
    for (let s = 0; s < snapshot.length; s++) {
      const id = snapshot[s];
      if (!this.slots.is_alive(id)) continue;
      const index = get_entity_index(id);
      if (!has_all(pools, index)) continue;

      args[0] = id;
      for (let i = 0; i < pools.length; i++) {
        args[i + 1] = pools[i].get(index);
      }
      // Use apply to spread the buffer as individual arguments
      (fn as (...a: unknown[]) => void).apply(null, args);
    }
  }

  //=========================================================
  // Direct pool access
  //=========================================================

  /** The pool for `type`, created on first use. */
  public pool<T>(type: ComponentType<T>): ComponentPool<T> {
    const existing = this.try_pool(type);
    if (existing !== undefined) return existing;

    const created = new ComponentPool(type, this.initial_capacity);
    this.pools.set(type, created);
    return created;
  }

  /** The pool for `type` if any entity has ever used it. */
  public try_pool<T>(type: ComponentType<T>): ComponentPool<T> | undefined {
    const pool = this.pools.get(type);
    return pool !== undefined && is_pool_of(pool, type) ? pool : undefined;
  }

  /** Component classes that currently have a pool, in first-use order. */
  public get component_types(): ComponentType[] {
    return [...this.pools.keys()];
  }

  //=========================================================
  // Internal
  //=========================================================

  private snapshot_ids(pool: ErasedPool): EntityID[] {
    const indices = pool.entity_indices();
    const ids: EntityID[] = new Array(indices.length);
    for (let i = 0; i < indices.length; i++) {
      ids[i] = this.slots.id_at(indices[i]);
    }
    return ids;
  }

  private assert_alive(id: EntityID, type: ComponentType): void {
    if (__DEV__ && !this.slots.is_alive(id)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        `Entity ${id} is not alive (while accessing ${component_name(type)})`,
        { entity: id, component: component_name(type) },
      );
    }
  }
}

function has_all(pools: readonly ErasedPool[], index: number): boolean {
  for (let i = 0; i < pools.length; i++) {
    if (!pools[i].has(index)) return false;
  }
  return true;
}
