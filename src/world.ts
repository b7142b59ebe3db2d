/***
 * World — Explicit ECS context.
 *
 * Composes EntityRegistry, ComponentRegistry and SystemScheduler, and is
 * the object every system receives as its context. Entities, components
 * and systems belong to one World; the log threshold set through
 * WorldOptions.log_level is process-wide.
 *
 * Usage:
 *
 *   const world = new World();
 *   const Position = world.register_component<Vec2>("Position", (d) => ({
 *     x: read_number(d, "x"),
 *     y: read_number(d, "y"),
 *   }));
 *   const Velocity = world.register_component<Vec2>("Velocity");
 *
 *   world.load(JSON.parse(text));           // { entities: [{ components: [...] }] }
 *
 *   world.add_system(define_system<World>({
 *     priority: 10,
 *     on_update(w, dt) {
 *       for (const e of w.query(Position, Velocity)) {
 *         const p = w.get_component(Position, e);
 *         const v = w.get_component(Velocity, e);
 *         p.x += v.x * dt;
 *         p.y += v.y * dt;
 *       }
 *     },
 *   }));
 *
 *   world.tick(1 / 60);                     // per frame
 *   world.shutdown();
 *
 ***/

import { EntityRegistry } from "./entity/entity_registry";
import type { EntityID } from "./entity/entity";
import { ComponentRegistry } from "./component/component_registry";
import type { ComponentDef, ComponentID } from "./component/component";
import {
  is_description_object,
  type ComponentFactory,
  type DescriptionValue,
} from "./component/description";
import { SystemScheduler } from "./system/system_scheduler";
import type { System } from "./system/system";
import { ECS_ERROR, ECSError } from "./utils/error";
import { create_logger, set_log_level, type LogLevel } from "./utils/logger";
import { DEFAULT_STRICT_LOAD, FIRST_FRAME_DELTA_TIME } from "./utils/constants";

const log = create_logger("world");

export interface WorldOptions {
  /** Global log threshold applied on construction. */
  log_level?: LogLevel;
  /** Throw on the first component that fails to load instead of skipping it. */
  strict_load?: boolean;
}

export type WorldSystem = System<World>;

export interface LoadFailure {
  /** Position of the entity entry in the document. */
  entity_index: number;
  /** Position of the component inside the entity entry; undefined if the entry itself was malformed. */
  component_index: number | undefined;
  /** Entity the component was meant for; undefined if no entity was created. */
  entity_id: EntityID | undefined;
  error: ECSError;
}

export interface LoadReport {
  entities: EntityID[];
  attached: number;
  failures: LoadFailure[];
}

export interface RunOptions {
  /** Checked before every frame; the loop ends once it returns true. */
  should_exit: () => boolean;
  /** Clock in seconds. */
  now?: () => number;
}

const default_now = (): number => performance.now() / 1000;

export class World {
  public readonly entities = new EntityRegistry();
  public readonly components = new ComponentRegistry();
  public readonly scheduler: SystemScheduler<World>;

  private readonly strict_load: boolean;

  constructor(options?: WorldOptions) {
    if (options?.log_level !== undefined) set_log_level(options.log_level);
    this.strict_load = options?.strict_load ?? DEFAULT_STRICT_LOAD;
    this.scheduler = new SystemScheduler<World>(this);
  }

  //=========================================================
  // Entities
  //=========================================================

  public create_entity(): EntityID {
    return this.entities.create_entity();
  }

  /**
   * Detach every component, then release the ID.
   * False (and nothing happens) if the entity is not alive.
   */
  public destroy_entity(id: EntityID): boolean {
    if (!this.entities.is_alive(id)) return false;
    this.components.remove_all_components(id);
    return this.entities.destroy_entity(id);
  }

  public is_alive(id: EntityID): boolean {
    return this.entities.is_alive(id);
  }

  public get entity_count(): number {
    return this.entities.count;
  }

  //=========================================================
  // Components
  //=========================================================

  public register_component<T>(
    name: string,
    from_description?: ComponentFactory<T>,
  ): ComponentDef<T> {
    return this.components.register(name, from_description);
  }

  /** False if the entity already has this component. */
  public add_component<T>(entity_id: EntityID, def: ComponentDef<T>, value: T): boolean {
    if (__DEV__ && !this.entities.is_alive(entity_id)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        `Cannot attach ${this.components.get_name(def)} to dead entity ${entity_id}`,
      );
    }
    return this.components.create_component(def, entity_id, value);
  }

  /** Precondition: has_component(entity_id, def). */
  public get_component<T>(def: ComponentDef<T>, entity_id: EntityID): T {
    return this.components.get_component(def, entity_id);
  }

  public has_component(entity_id: EntityID, def: ComponentID): boolean {
    return this.components.has_component(def, entity_id);
  }

  public remove_component(entity_id: EntityID, def: ComponentID): boolean {
    return this.components.remove_component(def, entity_id);
  }

  /**
   * Entities holding every listed component, as a snapshot: systems may
   * add or remove components while walking the result. Scans the
   * smallest store and probes the others.
   */
  public query(...defs: ComponentDef[]): EntityID[] {
    if (defs.length === 0) return [];

    let smallest = defs[0];
    for (let i = 1; i < defs.length; i++) {
      if (this.components.size_of(defs[i]) < this.components.size_of(smallest)) {
        smallest = defs[i];
      }
    }

    const out: EntityID[] = [];
    const ids = this.components.get_storage(smallest).ids;
    outer: for (let i = 0; i < ids.length; i++) {
      const id = ids[i];
      for (let j = 0; j < defs.length; j++) {
        if (defs[j] !== smallest && !this.components.has_component(defs[j], id)) {
          continue outer;
        }
      }
      out.push(id);
    }
    return out;
  }

  //=========================================================
  // Systems
  //=========================================================

  /** Queued; starts on the next tick. */
  public add_system(system: WorldSystem): boolean {
    return this.scheduler.add_system(system);
  }

  /** Queued; stops on the next tick. Keeps updating until then. */
  public remove_system(system: WorldSystem): boolean {
    return this.scheduler.remove_system(system);
  }

  /** One simulation step: apply queued adds, then removes, then update. */
  public tick(delta_time: number): void {
    this.scheduler.process_added_systems();
    this.scheduler.process_removed_systems();
    this.scheduler.update(delta_time);
  }

  /**
   * Frame loop. Each frame ticks with the duration of the previous
   * tick (0 for the first). Stops all systems when should_exit()
   * returns true. Returns the number of frames run.
   */
  public run(options: RunOptions): number {
    const now = options.now ?? default_now;
    let delta_time = FIRST_FRAME_DELTA_TIME;
    let frames = 0;

    while (!options.should_exit()) {
      const start = now();
      this.tick(delta_time);
      delta_time = now() - start;
      frames++;
    }

    this.scheduler.stop();
    return frames;
  }

  //=========================================================
  // Loading
  //=========================================================

  /**
   * Populate the world from a parsed document:
   *
   *   { "entities": [ { "components": [ { "type": "Position", "x": 0, "y": 0 } ] } ] }
   *
   * Each entry creates one entity. Components that fail to build are
   * logged and skipped (or thrown, with strict_load); an entry that is
   * not { components: [...] } is skipped without creating an entity.
   * A document without an `entities` array throws.
   */
  public load(document: DescriptionValue): LoadReport {
    const entries = is_description_object(document) ? document.entities : undefined;
    if (!Array.isArray(entries)) {
      throw new ECSError(
        ECS_ERROR.INVALID_DESCRIPTION,
        'World document must be an object with an "entities" array',
      );
    }

    const report: LoadReport = { entities: [], attached: 0, failures: [] };

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      const components = is_description_object(entry) ? entry.components : undefined;
      if (!Array.isArray(components)) {
        this.report_failure(report, {
          entity_index: i,
          component_index: undefined,
          entity_id: undefined,
          error: new ECSError(
            ECS_ERROR.INVALID_DESCRIPTION,
            'Entity entry must be an object with a "components" array',
            { entity_index: i },
          ),
        });
        continue;
      }

      const id = this.entities.create_entity();
      report.entities.push(id);

      for (let j = 0; j < components.length; j++) {
        const result = this.components.create_component_from_description(id, components[j]);
        if (result.ok) {
          report.attached++;
        } else {
          this.report_failure(report, {
            entity_index: i,
            component_index: j,
            entity_id: id,
            error: result.error,
          });
        }
      }
    }

    log.info(
      `loaded ${report.entities.length} entities, ${report.attached} components, ${report.failures.length} failures`,
    );
    return report;
  }

  //=========================================================
  // Teardown
  //=========================================================

  /** Graceful: stop every active system, then clear everything. */
  public shutdown(): void {
    this.scheduler.stop();
    this.clear();
  }

  /** Hard reset. No system hooks run. */
  public clear(): void {
    this.scheduler.clear();
    this.components.clear();
    this.entities.clear();
  }

  //=========================================================
  // Internal
  //=========================================================

  private report_failure(report: LoadReport, failure: LoadFailure): void {
    if (this.strict_load) throw failure.error;
    const where =
      failure.component_index === undefined
        ? `entity #${failure.entity_index}`
        : `entity #${failure.entity_index} component #${failure.component_index}`;
    log.warn(`skipped ${where}: ${failure.error.message}`);
    report.failures.push(failure);
  }
}
