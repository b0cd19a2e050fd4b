// Registry
export {
  Registry,
  type RegistryOptions,
  type EachFn,
  type ViewFn,
} from "./registry";

// Entities
export {
  INDEX_BITS,
  GENERATION_BITS,
  MAX_INDEX,
  MAX_GENERATION,
  INVALID_ENTITY,
  create_entity_id,
  get_entity_index,
  get_entity_generation,
  is_valid_entity_id,
  as_entity_id,
  type EntityID,
} from "./entity/entity";

// Components & pools
export type {
  ComponentType,
  ComponentClass,
  ComponentsOf,
  DefaultConstructible,
} from "./component/component";
export {
  ComponentPool,
  is_pool_of,
  type ErasedPool,
} from "./pool/component_pool";
export * from "./components";

// Systems
export {
  System,
  as_system_id,
  define_system,
  type SystemConfig,
  type SystemFn,
  type SystemID,
} from "./system/system";
export { SystemRegistry } from "./system/system_registry";
export { MovementSystem } from "./systems/movement_system";
export { LifetimeSystem } from "./systems/lifetime_system";

// Scripting bridge
export {
  EntityBindings,
  type BindingContext,
  type HealthReading,
} from "./bindings/entity_bindings";

// Errors & logging
export { AppError, ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";
export { ValidationError, VALIDATION_ERROR } from "./type_primitives";
export {
  Logger,
  LOG_LEVEL,
  type LogSink,
  type LoggerOptions,
} from "./utils/logger";
