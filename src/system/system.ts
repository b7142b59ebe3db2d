/***
 * System — Behaviour units driven by the SystemScheduler.
 *
 * A System is any object exposing a priority and the lifecycle hooks
 * below. Ctx is whatever the scheduler was built with (the World, in
 * practice), passed explicitly to every hook.
 *
 * Lifecycle:
 *   on_start(ctx)            — once, when the scheduler promotes it
 *   on_update(ctx, dt)       — every tick while active
 *   on_stop(ctx)             — once, when removed or at shutdown
 *
 * Lower priority runs first. Equal priorities run in the order the
 * systems were added.
 *
 ***/

export interface System<Ctx> {
  readonly name?: string;
  get_priority(): number;
  on_start?(ctx: Ctx): void;
  on_update(ctx: Ctx, delta_time: number): void;
  on_stop?(ctx: Ctx): void;
}

export enum SYSTEM_STATE {
  PENDING = "PENDING",
  ACTIVE = "ACTIVE",
  STOPPING = "STOPPING",
  REMOVED = "REMOVED",
}

export const DEFAULT_PRIORITY = 0;

export interface SystemConfig<Ctx> {
  name?: string;
  priority?: number;
  on_start?: (ctx: Ctx) => void;
  on_update: (ctx: Ctx, delta_time: number) => void;
  on_stop?: (ctx: Ctx) => void;
}

/**
 * Build a System from plain functions.
 *
 *   const gravity = define_system<World>({
 *     name: "gravity",
 *     priority: 10,
 *     on_update(world, dt) { ... },
 *   });
 */
export function define_system<Ctx>(config: SystemConfig<Ctx>): System<Ctx> {
  const priority = config.priority ?? DEFAULT_PRIORITY;
  return Object.freeze({
    name: config.name,
    get_priority: () => priority,
    on_start: config.on_start,
    on_update: config.on_update,
    on_stop: config.on_stop,
  });
}

export function system_name<Ctx>(system: System<Ctx>): string {
  return system.name ?? "anonymous";
}
