/***
 *
 * ComponentRegistry - One SparseSet per registered component type
 *
 * Types are registered up front into a closed table (name, optional
 * description factory). Storage for a type is created lazily on first
 * attach and dropped by clear(); registrations outlive clear(), so
 * handles held by systems stay valid across a reset.
 *
 * Typed calls route through the handle's ComponentID to the erased
 * SparseSet<unknown> and view it back as SparseSet<T>. The handle's
 * phantom type is the only thing that guarantees the stored values
 * really are T, which holds because a handle can only come from
 * register<T>().
 *
 ***/

import { SparseSet, unsafe_cast } from "type_primitives";
import type { EntityID } from "../entity/entity";
import {
  as_component_id,
  type ComponentDef,
  type ComponentID,
} from "./component";
import {
  get_type_tag,
  is_description_object,
  type ComponentFactory,
  type DescriptionResult,
  type DescriptionValue,
} from "./description";
import { ECS_ERROR, ECSError, is_ecs_error } from "../utils/error";
import { TYPE_TAG_FIELD } from "../utils/constants";

//=========================================================
// Internal types
//=========================================================

interface ComponentType {
  readonly name: string;
  readonly from_description: ComponentFactory<unknown> | undefined;
  storage: SparseSet<unknown, EntityID> | undefined;
}

//=========================================================
// ComponentRegistry
//=========================================================

export class ComponentRegistry {
  private types: ComponentType[] = [];
  private by_name: Map<string, ComponentID> = new Map();

  //=========================================================
  // Registration
  //=========================================================

  /** Number of registered component types. */
  public get count(): number {
    return this.types.length;
  }

  /**
   * Register a component type under a unique name.
   *
   * `from_description` is only needed for types that are built from
   * parsed world documents; without it the type can still be attached
   * directly with create_component().
   */
  public register<T>(
    name: string,
    from_description?: ComponentFactory<T>,
  ): ComponentDef<T> {
    if (this.by_name.has(name)) {
      throw new ECSError(
        ECS_ERROR.DUPLICATE_COMPONENT,
        `Component "${name}" is already registered`,
      );
    }

    const id = as_component_id(this.types.length);
    this.types.push({ name, from_description, storage: undefined });
    this.by_name.set(name, id);

    return unsafe_cast<ComponentDef<T>>(id);
  }

  /** Look up a handle by registered name. The value type is unknown. */
  public get_def(name: string): ComponentDef | undefined {
    const id = this.by_name.get(name);
    return id === undefined ? undefined : unsafe_cast<ComponentDef>(id);
  }

  public get_name(def: ComponentID): string {
    return this.get_type(def).name;
  }

  //=========================================================
  // Attach
  //=========================================================

  /**
   * Attach `value` to `entity_id`. Returns false (and keeps the old
   * value) if the entity already has this component.
   */
  public create_component<T>(
    def: ComponentDef<T>,
    entity_id: EntityID,
    value: T,
  ): boolean {
    return this.get_storage(def).add(entity_id, value);
  }

  /**
   * Build and attach a component from a description tree.
   *
   * Never throws on bad input: an unknown or missing type tag, a type
   * without a factory, a factory error, or an already-attached
   * component all come back as { ok: false, error }.
   */
  public create_component_from_description(
    entity_id: EntityID,
    description: DescriptionValue,
  ): DescriptionResult {
    if (!is_description_object(description)) {
      return fail(ECS_ERROR.INVALID_DESCRIPTION, "Component description must be an object");
    }

    const tag = get_type_tag(description);
    if (tag === undefined) {
      return fail(
        ECS_ERROR.INVALID_DESCRIPTION,
        `Component description needs a string "${TYPE_TAG_FIELD}" field`,
      );
    }

    const id = this.by_name.get(tag);
    if (id === undefined) {
      return fail(ECS_ERROR.UNKNOWN_COMPONENT_TYPE, `Unknown component type "${tag}"`, {
        type: tag,
      });
    }

    const type = this.types[id];
    if (type.from_description === undefined) {
      return fail(
        ECS_ERROR.UNKNOWN_COMPONENT_TYPE,
        `Component type "${tag}" cannot be built from a description`,
        { type: tag },
      );
    }

    let value: unknown;
    try {
      value = type.from_description(description);
    } catch (err) {
      if (is_ecs_error(err)) return { ok: false, error: err };
      return fail(
        ECS_ERROR.INVALID_DESCRIPTION,
        err instanceof Error ? err.message : String(err),
        { type: tag, cause: err },
      );
    }

    type.storage ??= new SparseSet<unknown, EntityID>();
    if (!type.storage.add(entity_id, value)) {
      return fail(
        ECS_ERROR.COMPONENT_ALREADY_PRESENT,
        `Entity ${entity_id} already has a "${tag}" component`,
        { type: tag, entity_id },
      );
    }

    return { ok: true, type: tag, component: id };
  }

  //=========================================================
  // Query / detach
  //=========================================================

  /** Precondition: has_component(def, entity_id). Unchecked. */
  public get_component<T>(def: ComponentDef<T>, entity_id: EntityID): T {
    return this.get_storage(def).get(entity_id);
  }

  public try_get_component<T>(
    def: ComponentDef<T>,
    entity_id: EntityID,
  ): T | undefined {
    const storage = this.get_type(def).storage;
    if (storage === undefined) return undefined;
    return unsafe_cast<SparseSet<T, EntityID>>(storage).try_get(entity_id);
  }

  public has_component(def: ComponentID, entity_id: EntityID): boolean {
    const storage = this.get_type(def).storage;
    return storage !== undefined && storage.has(entity_id);
  }

  /** Detach a component. False if the entity did not have it. */
  public remove_component(def: ComponentID, entity_id: EntityID): boolean {
    const storage = this.get_type(def).storage;
    return storage !== undefined && storage.remove(entity_id);
  }

  /** Detach every component of an entity. Returns how many were removed. */
  public remove_all_components(entity_id: EntityID): number {
    let removed = 0;
    for (let i = 0; i < this.types.length; i++) {
      const storage = this.types[i].storage;
      if (storage !== undefined && storage.remove(entity_id)) removed++;
    }
    return removed;
  }

  /** The live SparseSet for a type, for iteration via ids/values. */
  public get_storage<T>(def: ComponentDef<T>): SparseSet<T, EntityID> {
    const type = this.get_type(def);
    type.storage ??= new SparseSet<unknown, EntityID>();
    return unsafe_cast<SparseSet<T, EntityID>>(type.storage);
  }

  /** Number of entities holding this component. */
  public size_of(def: ComponentID): number {
    return this.get_type(def).storage?.size ?? 0;
  }

  //=========================================================
  // Cleanup
  //=========================================================

  /** Drop every per-type store. Registrations are kept. */
  public clear(): void {
    for (let i = 0; i < this.types.length; i++) {
      this.types[i].storage = undefined;
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private get_type(def: ComponentID): ComponentType {
    const type = this.types[def];
    if (type === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_REGISTERED,
        `Component ${def} is not registered`,
      );
    }
    return type;
  }
}

function fail(
  category: ECS_ERROR,
  message: string,
  context?: Record<string, unknown>,
): DescriptionResult {
  return { ok: false, error: new ECSError(category, message, context) };
}
