/***
 *
 * SystemScheduler - Owns systems and drives their lifecycle per tick.
 *
 * Mutations of the running set are deferred. add_system() and
 * remove_system() only enqueue; the host applies them between ticks:
 *
 *   scheduler.process_added_systems();    // on_start, then join the active list
 *   scheduler.process_removed_systems();  // on_stop, then leave it
 *   scheduler.update(dt);                 // on_update in priority order
 *
 * so a system may add or remove others (or itself) from inside its own
 * on_update without disturbing the iteration in progress. A system
 * queued for removal keeps updating until process_removed_systems().
 *
 * The active list is kept sorted by (priority, sequence) ascending,
 * where sequence is the order add_system() was called. Priority is
 * read once, at promotion; changing it later has no effect until the
 * system is removed and added again.
 *
 ***/

import { validate_and_cast } from "type_primitives";
import { ECS_ERROR, ECSError } from "../utils/error";
import { sorted_insert } from "../utils/arrays";
import { create_logger } from "../utils/logger";
import { SYSTEM_STATE, system_name, type System } from "./system";

const log = create_logger("scheduler");

interface SystemEntry<Ctx> {
  readonly system: System<Ctx>;
  readonly sequence: number;
  priority: number;
  state: SYSTEM_STATE;
}

const by_priority = <Ctx>(a: SystemEntry<Ctx>, b: SystemEntry<Ctx>): number =>
  a.priority - b.priority || a.sequence - b.sequence;

export class SystemScheduler<Ctx> {
  private entries: Map<System<Ctx>, SystemEntry<Ctx>> = new Map();
  private active: SystemEntry<Ctx>[] = [];
  private added_queue: SystemEntry<Ctx>[] = [];
  private removed_queue: SystemEntry<Ctx>[] = [];
  private next_sequence = 0;
  private updating = false;

  constructor(private readonly ctx: Ctx) {}

  //=========================================================
  // Queries
  //=========================================================

  public get active_count(): number {
    return this.active.length;
  }

  public get pending_count(): number {
    return this.added_queue.length;
  }

  public get removing_count(): number {
    return this.removed_queue.length;
  }

  /** True while the system is held in any state. */
  public has_system(system: System<Ctx>): boolean {
    return this.entries.has(system);
  }

  /** Lifecycle state, or undefined once the scheduler let go of it. */
  public get_state(system: System<Ctx>): SYSTEM_STATE | undefined {
    return this.entries.get(system)?.state;
  }

  /** Active systems in update order. Allocates. */
  public active_systems(): System<Ctx>[] {
    return this.active.map((entry) => entry.system);
  }

  //=========================================================
  // Deferred mutation
  //=========================================================

  /**
   * Queue a system for start on the next process_added_systems().
   * Returns false if the scheduler already holds it.
   */
  public add_system(system: System<Ctx>): boolean {
    if (this.entries.has(system)) return false;

    const entry: SystemEntry<Ctx> = {
      system,
      sequence: this.next_sequence++,
      priority: 0,
      state: SYSTEM_STATE.PENDING,
    };
    this.entries.set(system, entry);
    this.added_queue.push(entry);
    return true;
  }

  /**
   * Queue an active system for stop on the next process_removed_systems().
   * Returns false unless the system is currently ACTIVE (pending,
   * already-stopping and unknown systems are left alone).
   */
  public remove_system(system: System<Ctx>): boolean {
    const entry = this.entries.get(system);
    if (entry === undefined || entry.state !== SYSTEM_STATE.ACTIVE) return false;

    entry.state = SYSTEM_STATE.STOPPING;
    this.removed_queue.push(entry);
    return true;
  }

  //=========================================================
  // Between-tick processing
  //=========================================================

  /**
   * Start every queued system, in the order they were added, and
   * insert it into the active list. Systems added by an on_start hook
   * wait for the next call.
   *
   * Each entry leaves the queue only once it has been handled. If a
   * priority is invalid or an on_start throws, that system is released
   * (it may be added again), the rest stay queued and the error
   * propagates.
   */
  public process_added_systems(): void {
    this.assert_not_updating("process_added_systems");

    const batch_size = this.added_queue.length;
    for (let i = 0; i < batch_size; i++) {
      const entry = this.added_queue[0];
      if (entry === undefined) return;
      try {
        this.start_entry(entry);
      } catch (err) {
        this.dequeue(this.added_queue, entry);
        this.release(entry);
        throw err;
      }
      this.dequeue(this.added_queue, entry);
      log.debug(`started ${system_name(entry.system)} (priority ${entry.priority})`);
    }
  }

  /**
   * Stop every system queued for removal, in the order they were
   * queued, and drop it from the active list. A system leaves even if
   * its on_stop throws; the ones behind it stay queued and the error
   * propagates.
   */
  public process_removed_systems(): void {
    this.assert_not_updating("process_removed_systems");

    const batch_size = this.removed_queue.length;
    for (let i = 0; i < batch_size; i++) {
      const entry = this.removed_queue[0];
      if (entry === undefined) return;
      try {
        entry.system.on_stop?.(this.ctx);
      } finally {
        this.dequeue(this.removed_queue, entry);
        this.deactivate(entry);
        this.release(entry);
      }
      log.debug(`stopped ${system_name(entry.system)}`);
    }
  }

  //=========================================================
  // Tick
  //=========================================================

  /** Run on_update on every active system in priority order. Not reentrant. */
  public update(delta_time: number): void {
    this.assert_not_updating("update");
    const was_updating = this.updating;
    this.updating = true;
    try {
      const active = this.active;
      for (let i = 0; i < active.length; i++) {
        active[i].system.on_update(this.ctx, delta_time);
      }
    } finally {
      this.updating = was_updating;
    }
  }

  //=========================================================
  // Shutdown
  //=========================================================

  /**
   * Call on_stop once on every active system (including those queued
   * for removal), in priority order, and release them. Systems still
   * pending were never started, so they are not stopped and stay queued.
   *
   * A throwing on_stop does not cut the teardown short: every system is
   * stopped and released, then the first error is rethrown.
   */
  public stop(): void {
    this.assert_not_updating("stop");

    const stopping = this.active;
    this.active = [];
    this.removed_queue = [];

    let failure: { error: unknown } | undefined;
    for (let i = 0; i < stopping.length; i++) {
      const entry = stopping[i];
      try {
        entry.system.on_stop?.(this.ctx);
      } catch (error) {
        log.error(`on_stop of ${system_name(entry.system)} threw`, error);
        if (failure === undefined) failure = { error };
      } finally {
        this.release(entry);
      }
    }
    if (stopping.length > 0) log.info(`stopped ${stopping.length} system(s)`);
    if (failure !== undefined) throw failure.error;
  }

  /** Drop every system in every state. No hooks run. */
  public clear(): void {
    this.assert_not_updating("clear");
    this.entries.clear();
    this.active = [];
    this.added_queue = [];
    this.removed_queue = [];
  }

  //=========================================================
  // Internal
  //=========================================================

  private start_entry(entry: SystemEntry<Ctx>): void {
    entry.priority = validate_and_cast(
      entry.system.get_priority(),
      Number.isFinite,
      "System priority must be a finite number",
    );
    entry.system.on_start?.(this.ctx);
    entry.state = SYSTEM_STATE.ACTIVE;
    sorted_insert(this.active, entry, by_priority);
  }

  private deactivate(entry: SystemEntry<Ctx>): void {
    const index = this.active.indexOf(entry);
    if (index !== -1) this.active.splice(index, 1);
  }

  private release(entry: SystemEntry<Ctx>): void {
    entry.state = SYSTEM_STATE.REMOVED;
    if (this.entries.get(entry.system) === entry) this.entries.delete(entry.system);
  }

  private dequeue(queue: SystemEntry<Ctx>[], entry: SystemEntry<Ctx>): void {
    if (queue[0] === entry) queue.shift();
  }

  private assert_not_updating(operation: string): void {
    if (__DEV__ && this.updating) {
      throw new ECSError(
        ECS_ERROR.SCHEDULER_REENTRANT,
        `${operation}() cannot run while update() is iterating systems`,
      );
    }
  }
}
