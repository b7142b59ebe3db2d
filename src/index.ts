// World
export {
  World,
  type WorldOptions,
  type WorldSystem,
  type LoadReport,
  type LoadFailure,
  type RunOptions,
} from "./world";

// Entities
export { EntityRegistry } from "./entity/entity_registry";
export { as_entity_id, type EntityID } from "./entity/entity";

// Components
export { ComponentRegistry } from "./component/component_registry";
export type {
  ComponentDef,
  ComponentID,
  ComponentValue,
} from "./component/component";
export {
  read_boolean,
  read_number,
  read_number_array,
  read_object,
  read_optional_number,
  read_string,
  type ComponentFactory,
  type DescriptionObject,
  type DescriptionResult,
  type DescriptionValue,
} from "./component/description";

// Systems
export { SystemScheduler } from "./system/system_scheduler";
export {
  define_system,
  SYSTEM_STATE,
  type System,
  type SystemConfig,
} from "./system/system";

// Storage
export { SparseSet } from "type_primitives";

// Errors & logging
export { ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";
export { create_logger, set_log_level, type Logger, type LogLevel } from "./utils/logger";
