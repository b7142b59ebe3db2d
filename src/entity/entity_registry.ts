/***
 *
 * EntityRegistry - Allocates and recycles entity IDs.
 *
 * Components are not its concern: destroying an ID here leaves any
 * attached components in place. World.destroy_entity clears them first.
 *
 ***/

import { as_entity_id, type EntityID } from "./entity";
import { extend_number_array } from "../utils/arrays";
import { ALIVE, DEAD, INITIAL_ENTITY_CAPACITY } from "../utils/constants";

export class EntityRegistry {
  private alive_flags: number[] = new Array(INITIAL_ENTITY_CAPACITY).fill(DEAD);
  private high_water = 0;
  private free_ids: EntityID[] = [];
  private alive_count = 0;

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get count(): number {
    return this.alive_count;
  }

  /** Number of distinct IDs ever handed out since the last clear. */
  public get high_water_mark(): number {
    return this.high_water;
  }

  public is_alive(id: EntityID): boolean {
    return id >= 0 && id < this.high_water && this.alive_flags[id] === ALIVE;
  }

  /** Alive IDs in ascending order. Allocates. */
  public alive_ids(): EntityID[] {
    const out: EntityID[] = [];
    for (let i = 0; i < this.high_water; i++) {
      if (this.alive_flags[i] === ALIVE) out.push(as_entity_id(i));
    }
    return out;
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Allocate an entity.
   *
   * Reuses the most recently destroyed ID if there is one,
   * otherwise advances the high-water mark.
   */
  public create_entity(): EntityID {
    let id = this.free_ids.pop();

    if (id === undefined) {
      id = as_entity_id(this.high_water++);
      extend_number_array(this.alive_flags, this.high_water, DEAD);
    }

    this.alive_flags[id] = ALIVE;
    this.alive_count++;
    return id;
  }

  /**
   * Mark an entity dead and queue its ID for reuse.
   * Destroying an ID that is not alive is a no-op returning false.
   */
  public destroy_entity(id: EntityID): boolean {
    if (!this.is_alive(id)) return false;

    this.alive_flags[id] = DEAD;
    this.free_ids.push(id);
    this.alive_count--;
    return true;
  }

  public clear(): void {
    this.alive_flags = new Array(INITIAL_ENTITY_CAPACITY).fill(DEAD);
    this.high_water = 0;
    this.free_ids = [];
    this.alive_count = 0;
  }
}
