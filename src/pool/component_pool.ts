/***
 *
 * ComponentPool<T> — Sparse-set storage for a single component type
 *
 *   sparse[entity_index] → dense position, or EMPTY
 *   dense[i]             → entity index owning data[i]
 *   data[i]              → the component
 *
 * dense and data are parallel and packed (no holes), so iterating a
 * pool is a straight walk over two arrays. Invariant, for every
 * 0 <= i < size: sparse[dense[i]] === i.
 *
 * Pools are addressed by entity *index*, never by ID: the registry
 * resolves ID → index after its own aliveness check.
 *
 * Borrowing: remove() relocates the last element into the freed
 * position, so dense positions and the arrays returned by
 * entity_indices()/components() are only valid until the next
 * emplace/remove on this pool. Re-fetch by entity index afterwards.
 *
 ***/

import { component_name, type ComponentType } from "../component/component";
import { ECS_ERROR, ECSError } from "utils/error";
import { EMPTY, DEFAULT_INITIAL_CAPACITY } from "utils/constants";
import { grow_number_array } from "utils/arrays";

//=========================================================
// ErasedPool — what the registry needs without knowing T
//=========================================================

export interface ErasedPool {
  readonly type: ComponentType;
  readonly size: number;
  has(entity_index: number): boolean;
  /** No-op if the index owns nothing in this pool. */
  remove(entity_index: number): void;
  clear(): void;
  /** Live view in dense order. Copy before mutating the pool. */
  entity_indices(): readonly number[];
}

//=========================================================
// ComponentPool<T>
//=========================================================

export class ComponentPool<T> implements ErasedPool {
  private sparse: number[];
  private readonly dense: number[] = [];
  private readonly data: T[] = [];

  constructor(
    public readonly type: ComponentType<T>,
    initial_capacity = DEFAULT_INITIAL_CAPACITY,
  ) {
    this.sparse = new Array(initial_capacity).fill(EMPTY);
  }

  get size(): number {
    return this.dense.length;
  }

  has(entity_index: number): boolean {
    return (
      entity_index >= 0 &&
      entity_index < this.sparse.length &&
      this.sparse[entity_index] !== EMPTY
    );
  }

  /**
   * Store `value` for `entity_index` at the end of the dense arrays.
   * The entity must not already own a component of this type.
   */
  emplace(entity_index: number, value: T): T {
    if (entity_index >= this.sparse.length) {
      this.sparse = grow_number_array(this.sparse, entity_index + 1, EMPTY);
    }

    if (__DEV__ && this.sparse[entity_index] !== EMPTY) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_ALREADY_PRESENT,
        `Entity index ${entity_index} already owns ${component_name(this.type)}`,
        { entity_index, component: component_name(this.type) },
      );
    }

    this.sparse[entity_index] = this.dense.length;
    this.dense.push(entity_index);
    this.data.push(value);
    return value;
  }

  /** The component owned by `entity_index`. Requires has(entity_index). */
  get(entity_index: number): T {
    if (__DEV__ && !this.has(entity_index)) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_PRESENT,
        `Entity index ${entity_index} does not own ${component_name(this.type)}`,
        { entity_index, component: component_name(this.type) },
      );
    }
    return this.data[this.sparse[entity_index]];
  }

  try_get(entity_index: number): T | undefined {
    return this.has(entity_index)
      ? this.data[this.sparse[entity_index]]
      : undefined;
  }

  /**
   * Remove via swap-and-pop. O(1).
   *
   * The last dense element moves into the freed position and its sparse
   * entry is repointed before the arrays shrink; getting this order
   * wrong corrupts the *next* unrelated remove, not this one.
   */
  remove(entity_index: number): void {
    if (!this.has(entity_index)) return;

    const row = this.sparse[entity_index];
    const last = this.dense.length - 1;

    if (row !== last) {
      const moved_index = this.dense[last];
      this.dense[row] = moved_index;
      this.data[row] = this.data[last];
      this.sparse[moved_index] = row;
    }

    this.dense.pop();
    this.data.pop();
    this.sparse[entity_index] = EMPTY;
  }

  clear(): void {
    this.sparse = new Array(this.sparse.length).fill(EMPTY);
    this.dense.length = 0;
    this.data.length = 0;
  }

  entity_indices(): readonly number[] {
    return this.dense;
  }

  /** Live view of the components, parallel to entity_indices(). */
  components(): readonly T[] {
    return this.data;
  }

  /** Dense position of `entity_index`, or EMPTY. Exposed for invariant checks. */
  dense_index_of(entity_index: number): number {
    return this.has(entity_index) ? this.sparse[entity_index] : EMPTY;
  }
}

/**
 * Narrow an erased pool back to its typed form. The check is on the
 * stored class, so it cannot succeed for a pool of a different type.
 */
export function is_pool_of<T>(
  pool: ErasedPool,
  type: ComponentType<T>,
): pool is ComponentPool<T> {
  return pool instanceof ComponentPool && pool.type === type;
}
