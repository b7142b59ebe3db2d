/***
 * Entity — Dense integer IDs.
 *
 * An EntityID is a plain non-negative integer, assigned from a
 * high-water mark and recycled through a free list once destroyed.
 * IDs index straight into every component SparseSet, so they stay
 * small and dense. Nothing is ever handed out while still alive.
 *
 ***/

import {
  type Brand,
  is_non_negative_integer,
  validate_and_cast,
} from "type_primitives";

export type EntityID = Brand<number, "entity_id">;

export const as_entity_id = (value: number) =>
  validate_and_cast<number, EntityID>(
    value,
    is_non_negative_integer,
    "EntityID must be a non-negative integer",
  );
