/***
 *
 * EntityRegistry — The slot table: allocates and recycles generational IDs.
 *
 * generations[index] holds the current generation of every slot ever
 * handed out. Freed indices wait in a FIFO queue, so a slot is reused
 * only after every earlier-freed slot; this spreads generation bumps
 * across slots and delays wraparound for any single one.
 *
 * Slot lifecycle: Free → Alive → Free → … The slot itself is permanent;
 * only its occupant changes, and the generation strictly increases
 * (mod 4096) with every destroy.
 *
 ***/

import {
  type EntityID,
  MAX_GENERATION,
  MAX_INDEX,
  create_entity_id,
  get_entity_generation,
  get_entity_index,
} from "./entity";
import { SparseSet } from "type_primitives";
import { ECS_ERROR, ECSError } from "utils/error";
import { grow_number_array } from "utils/arrays";
import {
  DEFAULT_INITIAL_CAPACITY,
  INITIAL_GENERATION,
} from "utils/constants";
import { Logger } from "utils/logger";

export class EntityRegistry {
  private generations: number[];
  private high_water = 0;
  // FIFO free queue: live entries are free_queue[free_head..length-1]
  private free_queue: number[] = [];
  private free_head = 0;
  private readonly alive: SparseSet;
  private readonly initial_capacity: number;

  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this.initial_capacity = initial_capacity;
    this.generations = new Array(initial_capacity).fill(INITIAL_GENERATION);
    this.alive = new SparseSet(initial_capacity);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get count(): number {
    return this.alive.size;
  }

  /** Number of slots ever allocated (alive or free). */
  public get slot_count(): number {
    return this.high_water;
  }

  /** Number of recycled slots waiting for reuse. */
  public get free_count(): number {
    return this.free_queue.length - this.free_head;
  }

  /**
   * Check whether an ID refers to a living entity.
   *
   * The index must fall within the allocated range and the generation
   * baked into the ID must match the slot's current generation. The
   * live-set check rejects an ID forged with the generation a freed
   * slot is waiting to hand out next.
   */
  public is_alive(id: EntityID): boolean {
    const index = get_entity_index(id);
    return (
      index < this.high_water &&
      this.generations[index] === get_entity_generation(id) &&
      this.alive.has(index)
    );
  }

  /** Current generation of a slot, or -1 for a slot never allocated. */
  public generation_of(index: number): number {
    return index < this.high_water ? this.generations[index] : -1;
  }

  /** The ID currently occupying `index`, whether or not it is alive. */
  public id_at(index: number): EntityID {
    return create_entity_id(index, this.generations[index]);
  }

  /** Snapshot of live IDs. Order is not guaranteed. */
  public alive_ids(): EntityID[] {
    const indices = this.alive.values;
    const ids: EntityID[] = new Array(indices.length);
    for (let i = 0; i < indices.length; i++) ids[i] = this.id_at(indices[i]);
    return ids;
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Allocate a new entity.
   *
   * Reuses the oldest recycled slot when there is one (its generation
   * was already bumped during destroy). Otherwise advances the
   * high-water mark and starts the fresh slot at generation 0.
   *
   * MAX_INDEX itself is never allocated, so no live ID can equal
   * INVALID_ENTITY.
   */
  public create(): EntityID {
    let index: number;

    if (this.free_head < this.free_queue.length) {
      index = this.free_queue[this.free_head++];
      // Drop the consumed prefix once it is at least half the array
      if (this.free_head * 2 >= this.free_queue.length) {
        this.free_queue = this.free_queue.slice(this.free_head);
        this.free_head = 0;
      }
    } else {
      if (this.high_water >= MAX_INDEX) {
        throw new ECSError(
          ECS_ERROR.EID_MAX_INDEX_OVERFLOW,
          `Cannot allocate more than ${MAX_INDEX} entity slots`,
        );
      }
      index = this.high_water++;
      if (index >= this.generations.length) {
        this.generations = grow_number_array(
          this.generations,
          index + 1,
          INITIAL_GENERATION,
        );
      }
      this.generations[index] = INITIAL_GENERATION;
    }

    this.alive.add(index);
    return create_entity_id(index, this.generations[index]);
  }

  /**
   * Free a living entity's slot.
   *
   * Bumps the generation (wrapping at MAX_GENERATION) so the old ID
   * goes stale, then queues the index for reuse. Returns false, and
   * changes nothing, when the ID is not alive.
   */
  public destroy(id: EntityID): boolean {
    if (!this.is_alive(id)) return false;

    const index = get_entity_index(id);
    const next_generation = (get_entity_generation(id) + 1) & MAX_GENERATION;
    if (next_generation === INITIAL_GENERATION) {
      Logger.warn(
        "entity",
        `Generation of slot ${index} wrapped to 0; stale IDs for this slot may read as alive again`,
      );
    }

    this.generations[index] = next_generation;
    this.free_queue.push(index);
    this.alive.delete(index);
    return true;
  }

  /** Forget every slot. The next create() returns index 0, generation 0. */
  public clear(): void {
    this.generations = new Array(this.initial_capacity).fill(
      INITIAL_GENERATION,
    );
    this.high_water = 0;
    this.free_queue = [];
    this.free_head = 0;
    this.alive.clear();
  }
}
