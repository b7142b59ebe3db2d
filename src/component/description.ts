/***
 *
 * Description - Generic structured input for building components
 *
 * A description is a parsed key/value tree (the shape JSON.parse gives
 * back). The only field the registry reads is the type tag; the rest is
 * payload handed to that type's factory. The read_* helpers give
 * factories checked field access, throwing INVALID_DESCRIPTION so the
 * registry can report the entry and move on.
 *
 ***/

import { ECS_ERROR, ECSError } from "../utils/error";
import { TYPE_TAG_FIELD } from "../utils/constants";
import type { ComponentID } from "./component";

export type DescriptionValue =
  | string
  | number
  | boolean
  | null
  | DescriptionValue[]
  | DescriptionObject;

export interface DescriptionObject {
  readonly [key: string]: DescriptionValue;
}

/** Builds a component value from its description. May throw. */
export type ComponentFactory<T> = (description: DescriptionObject) => T;

export type DescriptionResult =
  | { readonly ok: true; readonly type: string; readonly component: ComponentID }
  | { readonly ok: false; readonly error: ECSError };

export function is_description_object(
  value: DescriptionValue | undefined,
): value is DescriptionObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The type tag, or undefined if missing or not a non-empty string. */
export function get_type_tag(description: DescriptionObject): string | undefined {
  const tag = description[TYPE_TAG_FIELD];
  return typeof tag === "string" && tag.length > 0 ? tag : undefined;
}

//=========================================================
// Field readers
//=========================================================

function invalid(field: string, expected: string, got: DescriptionValue | undefined): ECSError {
  return new ECSError(
    ECS_ERROR.INVALID_DESCRIPTION,
    `Field "${field}" must be ${expected}`,
    { field, got },
  );
}

export function read_number(description: DescriptionObject, field: string): number {
  const v = description[field];
  if (typeof v !== "number" || !Number.isFinite(v)) throw invalid(field, "a finite number", v);
  return v;
}

export function read_optional_number(
  description: DescriptionObject,
  field: string,
  fallback: number,
): number {
  return description[field] === undefined ? fallback : read_number(description, field);
}

export function read_string(description: DescriptionObject, field: string): string {
  const v = description[field];
  if (typeof v !== "string") throw invalid(field, "a string", v);
  return v;
}

export function read_boolean(description: DescriptionObject, field: string): boolean {
  const v = description[field];
  if (typeof v !== "boolean") throw invalid(field, "a boolean", v);
  return v;
}

export function read_number_array(
  description: DescriptionObject,
  field: string,
  length?: number,
): number[] {
  const v = description[field];
  if (!Array.isArray(v)) throw invalid(field, "an array of numbers", v);
  const out: number[] = [];
  for (const item of v) {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw invalid(field, "an array of numbers", v);
    }
    out.push(item);
  }
  if (length !== undefined && out.length !== length) {
    throw invalid(field, `an array of ${length} numbers`, v);
  }
  return out;
}

export function read_object(description: DescriptionObject, field: string): DescriptionObject {
  const v = description[field];
  if (!is_description_object(v)) throw invalid(field, "an object", v);
  return v;
}
