import type { LogLevel } from "./logger";

// Sparse index sentinel: "no dense slot for this id"
export const ABSENT = -1;

// Entity liveness flags
export const DEAD = 0;
export const ALIVE = 1;
export const INITIAL_ENTITY_CAPACITY = 64;

// Key of the type tag inside a component description
export const TYPE_TAG_FIELD = "type";

// Default World configuration
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const DEFAULT_STRICT_LOAD = false;

// First frame of World.run() has no measured predecessor
export const FIRST_FRAME_DELTA_TIME = 0;
