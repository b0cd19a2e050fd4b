/***
 * Brand — Nominal number types for entity and system handles.
 *
 * EntityID and SystemID are plain numbers at runtime, so nothing but the
 * brand stops a SystemID or a loop counter from being passed where the
 * registry expects an EntityID. Values are branded only where they are
 * proven valid: create_entity_id for packed IDs, as_entity_id and
 * as_system_id for raw numbers, and the bindings after they have checked
 * a handle that arrived from a script.
 *
 ***/

declare const tag: unique symbol;

export type Brand<Base, Name extends string> = Base & {
  readonly [tag]: Name;
};
