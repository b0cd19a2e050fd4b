/***
 * Entity — Packed generational ID (20-bit index | 12-bit generation).
 *
 * Each entity ID encodes a slot index (low 20 bits) and a generation
 * counter (high 12 bits). When an entity is destroyed its slot's
 * generation increments, so an ID captured before the destroy no
 * longer matches and reads as dead, even after the slot is reused.
 *
 * Layout: [generation:12][index:20]
 *
 *   create_entity_id(index, gen) → ((gen & 0xFFF) << 20) | (index & 0xFFFFF)
 *   get_entity_index(id)         → id & 0xFFFFF
 *   get_entity_generation(id)    → (id >>> 20) & 0xFFF
 *
 * Composition masks its inputs instead of throwing: generation
 * wraparound after 4096 recycles of one slot is an accepted risk.
 * INVALID_ENTITY (all ones) is reserved and never handed out.
 *
 ***/

import {
  type Brand,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";

export type EntityID = Brand<number, "entity_id">;

export const INDEX_BITS = 20;
export const GENERATION_BITS = 32 - INDEX_BITS;
export const INDEX_MASK = (1 << INDEX_BITS) - 1; // 0xFFFFF
export const MAX_INDEX = INDEX_MASK; // 1,048,575
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1; // 0xFFF (4095)

export const INVALID_ENTITY = unsafe_cast<EntityID>(0xffffffff);

export const create_entity_id = (
  index: number,
  generation: number,
): EntityID =>
  // >>> 0 keeps the result unsigned when the generation fills the sign bit
  unsafe_cast<EntityID>(
    (((generation & MAX_GENERATION) << INDEX_BITS) | (index & INDEX_MASK)) >>>
      0,
  );

export const get_entity_index = (id: EntityID): number => id & INDEX_MASK;

export const get_entity_generation = (id: EntityID): number =>
  (id >>> INDEX_BITS) & MAX_GENERATION;

/** True for any unsigned 32-bit integer other than INVALID_ENTITY. */
export const is_valid_entity_id = (value: number): boolean =>
  Number.isInteger(value) && value >= 0 && value < INVALID_ENTITY;

export const as_entity_id = (value: number) =>
  validate_and_cast<number, EntityID>(
    value,
    is_valid_entity_id,
    "EntityID must be an unsigned 32-bit integer other than INVALID_ENTITY",
  );
