/***
 *
 * Component - Phantom-typed handles to registered component types
 *
 * A component is any plain value attached to an entity. Each registered
 * type gets its own SparseSet; the registry keeps them in a table
 * indexed by ComponentID.
 *
 * A ComponentDef<T> is at runtime just that ComponentID (a number), but
 * at compile time it carries T, so registry.get_component(Position, e)
 * comes back as Position without the caller naming the type again.
 *
 ***/

import {
  type Brand,
  is_non_negative_integer,
  validate_and_cast,
} from "type_primitives";

//=========================================================
// ComponentID
//=========================================================
export type ComponentID = Brand<number, "component_id">;
export const as_component_id = (value: number) =>
  validate_and_cast<number, ComponentID>(
    value,
    is_non_negative_integer,
    "ComponentID must be a non-negative integer",
  );

//=========================================================
// ComponentDef<T> - phantom-typed component handle
//=========================================================

declare const __value: unique symbol;

export type ComponentDef<T = unknown> = ComponentID & {
  readonly [__value]: T;
};

/** Extracts the stored value type from a handle. */
export type ComponentValue<D> = D extends ComponentDef<infer T> ? T : never;
