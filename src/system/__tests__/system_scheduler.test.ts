import { describe, expect, it, vi } from "vitest";
import { SystemScheduler } from "../system_scheduler";
import { define_system, SYSTEM_STATE, type System } from "../system";
import { ECS_ERROR, ECSError } from "../../utils/error";

interface TestCtx {
  events: string[];
}

function make_scheduler() {
  const ctx: TestCtx = { events: [] };
  return { ctx, scheduler: new SystemScheduler<TestCtx>(ctx) };
}

/** A system that records each hook call as "<name>.<hook>" in ctx.events. */
function recorder(
  name: string,
  priority = 0,
  on_update?: (ctx: TestCtx, dt: number) => void,
): System<TestCtx> {
  return define_system<TestCtx>({
    name,
    priority,
    on_start: (ctx) => ctx.events.push(`${name}.start`),
    on_update: (ctx, dt) => {
      ctx.events.push(`${name}.update`);
      on_update?.(ctx, dt);
    },
    on_stop: (ctx) => ctx.events.push(`${name}.stop`),
  });
}

function tick(scheduler: SystemScheduler<TestCtx>, dt = 0.016): void {
  scheduler.process_added_systems();
  scheduler.process_removed_systems();
  scheduler.update(dt);
}

describe("SystemScheduler", () => {
  //=========================================================
  // add_system / process_added_systems
  //=========================================================

  it("added systems stay pending until processed", () => {
    const { ctx, scheduler } = make_scheduler();
    const a = recorder("a");

    expect(scheduler.add_system(a)).toBe(true);
    expect(scheduler.get_state(a)).toBe(SYSTEM_STATE.PENDING);
    expect(scheduler.pending_count).toBe(1);

    scheduler.update(0.1);
    expect(ctx.events).toEqual([]);

    scheduler.process_added_systems();
    expect(scheduler.get_state(a)).toBe(SYSTEM_STATE.ACTIVE);
    expect(scheduler.active_count).toBe(1);
    expect(scheduler.pending_count).toBe(0);
    expect(ctx.events).toEqual(["a.start"]);
  });

  it("starts queued systems in enqueue order regardless of priority", () => {
    const { ctx, scheduler } = make_scheduler();
    scheduler.add_system(recorder("late", 9));
    scheduler.add_system(recorder("early", 1));

    scheduler.process_added_systems();

    expect(ctx.events).toEqual(["late.start", "early.start"]);
  });

  it("adding a system twice fails", () => {
    const { scheduler } = make_scheduler();
    const a = recorder("a");
    scheduler.add_system(a);
    expect(scheduler.add_system(a)).toBe(false);
    scheduler.process_added_systems();
    expect(scheduler.add_system(a)).toBe(false);
    expect(scheduler.active_count).toBe(1);
  });

  it("on_start receives the scheduler context", () => {
    const { ctx, scheduler } = make_scheduler();
    const on_start = vi.fn();
    scheduler.add_system(define_system<TestCtx>({ on_start, on_update: () => {} }));
    scheduler.process_added_systems();
    expect(on_start).toHaveBeenCalledOnce();
    expect(on_start).toHaveBeenCalledWith(ctx);
  });

  it("systems without start/stop hooks are fine", () => {
    const { scheduler } = make_scheduler();
    const bare: System<TestCtx> = {
      get_priority: () => 0,
      on_update: () => {},
    };
    scheduler.add_system(bare);
    expect(() => tick(scheduler)).not.toThrow();
    scheduler.remove_system(bare);
    expect(() => scheduler.process_removed_systems()).not.toThrow();
    expect(scheduler.has_system(bare)).toBe(false);
  });

  it("rejects a non-finite priority and releases that system", () => {
    const { ctx, scheduler } = make_scheduler();
    const nan = recorder("nan", NaN);
    const next = recorder("next", 1);
    scheduler.add_system(nan);
    scheduler.add_system(next);

    expect(() => scheduler.process_added_systems()).toThrow();
    expect(scheduler.has_system(nan)).toBe(false);
    expect(scheduler.get_state(next)).toBe(SYSTEM_STATE.PENDING);
    expect(scheduler.pending_count).toBe(1);

    scheduler.process_added_systems();
    expect(ctx.events).toEqual(["next.start"]);
    expect(scheduler.add_system(nan)).toBe(true);
  });

  it("a throwing on_start keeps the rest of the batch queued", () => {
    const { ctx, scheduler } = make_scheduler();
    const bad = define_system<TestCtx>({
      name: "bad",
      on_start: () => {
        throw new Error("start failed");
      },
      on_update: (c) => c.events.push("bad.update"),
    });
    const good = recorder("good");
    scheduler.add_system(bad);
    scheduler.add_system(good);

    expect(() => scheduler.process_added_systems()).toThrow("start failed");
    expect(scheduler.has_system(bad)).toBe(false);
    expect(scheduler.get_state(good)).toBe(SYSTEM_STATE.PENDING);
    expect(scheduler.pending_count).toBe(1);
    expect(scheduler.active_count).toBe(0);

    tick(scheduler);
    expect(ctx.events).toEqual(["good.start", "good.update"]);
    expect(scheduler.get_state(good)).toBe(SYSTEM_STATE.ACTIVE);
  });

  //=========================================================
  // Ordering
  //=========================================================

  it("updates in ascending priority with insertion order as tie-break", () => {
    const { ctx, scheduler } = make_scheduler();
    scheduler.add_system(recorder("A", 10));
    scheduler.add_system(recorder("B", 5));
    scheduler.add_system(recorder("C", 5));

    scheduler.process_added_systems();
    ctx.events.length = 0;
    scheduler.update(0.016);

    expect(ctx.events).toEqual(["B.update", "C.update", "A.update"]);
  });

  it("ordering holds across repeated add/remove cycles", () => {
    const { ctx, scheduler } = make_scheduler();
    const a = recorder("A", 10);
    const b = recorder("B", 5);
    const c = recorder("C", 5);
    const d = recorder("D", -1);
    scheduler.add_system(a);
    scheduler.add_system(b);
    scheduler.add_system(c);
    tick(scheduler);

    // B leaves and comes back: it now follows C at equal priority
    scheduler.remove_system(b);
    tick(scheduler);
    scheduler.add_system(b);
    scheduler.add_system(d);
    scheduler.process_added_systems();

    ctx.events.length = 0;
    scheduler.update(0.016);
    expect(ctx.events).toEqual(["D.update", "C.update", "B.update", "A.update"]);
    expect(scheduler.active_systems()).toEqual([d, c, b, a]);

    scheduler.remove_system(c);
    scheduler.process_removed_systems();
    ctx.events.length = 0;
    scheduler.update(0.016);
    expect(ctx.events).toEqual(["D.update", "B.update", "A.update"]);
  });

  it("passes delta_time and context to on_update", () => {
    const { ctx, scheduler } = make_scheduler();
    const on_update = vi.fn();
    scheduler.add_system(define_system<TestCtx>({ on_update }));
    tick(scheduler, 0.25);
    expect(on_update).toHaveBeenCalledWith(ctx, 0.25);
  });

  //=========================================================
  // remove_system / process_removed_systems
  //=========================================================

  it("remove only targets active systems", () => {
    const { scheduler } = make_scheduler();
    const a = recorder("a");

    expect(scheduler.remove_system(a)).toBe(false);

    scheduler.add_system(a);
    expect(scheduler.remove_system(a)).toBe(false);
    expect(scheduler.get_state(a)).toBe(SYSTEM_STATE.PENDING);

    scheduler.process_added_systems();
    expect(scheduler.remove_system(a)).toBe(true);
    expect(scheduler.get_state(a)).toBe(SYSTEM_STATE.STOPPING);
    expect(scheduler.remove_system(a)).toBe(false);
    expect(scheduler.removing_count).toBe(1);
  });

  it("a stopping system keeps updating until removals are processed", () => {
    const { ctx, scheduler } = make_scheduler();
    const a = recorder("a");
    scheduler.add_system(a);
    scheduler.process_added_systems();

    scheduler.remove_system(a);
    ctx.events.length = 0;
    scheduler.update(0.016);
    expect(ctx.events).toEqual(["a.update"]);

    scheduler.process_removed_systems();
    expect(ctx.events).toEqual(["a.update", "a.stop"]);
    expect(scheduler.get_state(a)).toBeUndefined();
    expect(scheduler.has_system(a)).toBe(false);
    expect(scheduler.active_count).toBe(0);

    scheduler.update(0.016);
    expect(ctx.events).toEqual(["a.update", "a.stop"]);
  });

  it("a throwing on_stop still removes that system and keeps the rest queued", () => {
    const { ctx, scheduler } = make_scheduler();
    const bad = define_system<TestCtx>({
      name: "bad",
      on_update: (c) => c.events.push("bad.update"),
      on_stop: () => {
        throw new Error("stop failed");
      },
    });
    const good = recorder("good", 1);
    scheduler.add_system(bad);
    scheduler.add_system(good);
    scheduler.process_added_systems();
    scheduler.remove_system(bad);
    scheduler.remove_system(good);

    ctx.events.length = 0;
    expect(() => scheduler.process_removed_systems()).toThrow("stop failed");
    expect(scheduler.has_system(bad)).toBe(false);
    expect(scheduler.active_systems()).toEqual([good]);
    expect(scheduler.get_state(good)).toBe(SYSTEM_STATE.STOPPING);
    expect(scheduler.removing_count).toBe(1);

    scheduler.process_removed_systems();
    scheduler.update(0.016);
    expect(ctx.events).toEqual(["good.stop"]);
    expect(scheduler.has_system(good)).toBe(false);
    expect(scheduler.active_count).toBe(0);
  });

  it("stops queued removals in the order they were queued", () => {
    const { ctx, scheduler } = make_scheduler();
    const a = recorder("a", 1);
    const b = recorder("b", 2);
    scheduler.add_system(a);
    scheduler.add_system(b);
    scheduler.process_added_systems();

    scheduler.remove_system(b);
    scheduler.remove_system(a);
    ctx.events.length = 0;
    scheduler.process_removed_systems();

    expect(ctx.events).toEqual(["b.stop", "a.stop"]);
  });

  it("a removed system can be added again and restarts", () => {
    const { ctx, scheduler } = make_scheduler();
    const a = recorder("a");
    scheduler.add_system(a);
    tick(scheduler);
    scheduler.remove_system(a);
    tick(scheduler);

    expect(scheduler.add_system(a)).toBe(true);
    tick(scheduler);

    expect(ctx.events).toEqual(["a.start", "a.update", "a.stop", "a.start", "a.update"]);
  });

  //=========================================================
  // Mutation from inside update
  //=========================================================

  it("removing a later system mid-update still lets it run this tick", () => {
    const { ctx, scheduler } = make_scheduler();
    const s2 = recorder("s2", 2);
    const s1 = recorder("s1", 1, () => {
      scheduler.remove_system(s2);
    });
    scheduler.add_system(s1);
    scheduler.add_system(s2);
    scheduler.process_added_systems();

    ctx.events.length = 0;
    scheduler.update(0.016);
    expect(ctx.events).toEqual(["s1.update", "s2.update"]);
    expect(scheduler.get_state(s2)).toBe(SYSTEM_STATE.STOPPING);

    scheduler.process_added_systems();
    expect(ctx.events).toEqual(["s1.update", "s2.update"]);

    scheduler.process_removed_systems();
    expect(ctx.events).toEqual(["s1.update", "s2.update", "s2.stop"]);
  });

  it("a system can remove itself during its own update", () => {
    const { ctx, scheduler } = make_scheduler();
    const self: System<TestCtx> = recorder("self", 0, () => {
      scheduler.remove_system(self);
    });
    scheduler.add_system(self);
    tick(scheduler);
    tick(scheduler);

    expect(ctx.events).toEqual(["self.start", "self.update", "self.stop"]);
  });

  it("a system added mid-update starts on the next processing pass", () => {
    const { ctx, scheduler } = make_scheduler();
    const child = recorder("child", -5);
    const parent = recorder("parent", 0, () => {
      scheduler.add_system(child);
    });
    scheduler.add_system(parent);
    tick(scheduler);
    expect(ctx.events).toEqual(["parent.start", "parent.update"]);

    tick(scheduler);
    expect(ctx.events).toEqual([
      "parent.start",
      "parent.update",
      "child.start",
      "child.update",
      "parent.update",
    ]);
  });

  it("a system added from on_start waits for the next pass", () => {
    const { ctx, scheduler } = make_scheduler();
    const child = recorder("child");
    scheduler.add_system(
      define_system<TestCtx>({
        name: "parent",
        on_start: () => {
          scheduler.add_system(child);
        },
        on_update: () => {},
      }),
    );

    scheduler.process_added_systems();
    expect(scheduler.get_state(child)).toBe(SYSTEM_STATE.PENDING);
    scheduler.process_added_systems();
    expect(ctx.events).toEqual(["child.start"]);
  });

  it("processing or stopping from inside update throws", () => {
    const { scheduler } = make_scheduler();
    let caught: unknown;
    scheduler.add_system(
      define_system<TestCtx>({
        on_update: () => {
          try {
            scheduler.process_added_systems();
          } catch (err) {
            caught = err;
          }
        },
      }),
    );
    tick(scheduler);

    expect(caught).toBeInstanceOf(ECSError);
    expect((caught as ECSError).category).toBe(ECS_ERROR.SCHEDULER_REENTRANT);
    // the flag is reset once update returns
    expect(() => scheduler.process_added_systems()).not.toThrow();
  });

  it("a nested update from inside update throws and keeps the guard up", () => {
    const { scheduler } = make_scheduler();
    const caught: unknown[] = [];
    scheduler.add_system(
      define_system<TestCtx>({
        priority: 0,
        on_update: () => {
          try {
            scheduler.update(0);
          } catch (err) {
            caught.push(err);
          }
        },
      }),
    );
    scheduler.add_system(
      define_system<TestCtx>({
        priority: 1,
        on_update: () => {
          try {
            scheduler.clear();
          } catch (err) {
            caught.push(err);
          }
        },
      }),
    );
    tick(scheduler);

    expect(caught.length).toBe(2);
    expect(caught.map((err) => (err as ECSError).category)).toEqual([
      ECS_ERROR.SCHEDULER_REENTRANT,
      ECS_ERROR.SCHEDULER_REENTRANT,
    ]);
    expect(scheduler.active_count).toBe(2);
  });

  it("an exception in on_update propagates and leaves the scheduler usable", () => {
    const { scheduler } = make_scheduler();
    scheduler.add_system(
      define_system<TestCtx>({
        on_update: () => {
          throw new Error("boom");
        },
      }),
    );
    scheduler.process_added_systems();
    expect(() => scheduler.update(0.016)).toThrow("boom");
    expect(() => scheduler.stop()).not.toThrow();
  });

  //=========================================================
  // stop / clear
  //=========================================================

  it("stop calls on_stop exactly once on every active system", () => {
    const { ctx, scheduler } = make_scheduler();
    const a = recorder("a", 2);
    const b = recorder("b", 1);
    const stopping = recorder("stopping", 3);
    scheduler.add_system(a);
    scheduler.add_system(b);
    scheduler.add_system(stopping);
    scheduler.process_added_systems();
    scheduler.remove_system(stopping);

    ctx.events.length = 0;
    scheduler.stop();
    expect(ctx.events).toEqual(["b.stop", "a.stop", "stopping.stop"]);
    expect(scheduler.active_count).toBe(0);
    expect(scheduler.removing_count).toBe(0);

    scheduler.stop();
    scheduler.process_removed_systems();
    expect(ctx.events).toEqual(["b.stop", "a.stop", "stopping.stop"]);
  });

  it("stop runs every on_stop even when one throws, then rethrows", () => {
    const { ctx, scheduler } = make_scheduler();
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const bad = define_system<TestCtx>({
      name: "bad",
      priority: 0,
      on_update: () => {},
      on_stop: () => {
        throw new Error("stop failed");
      },
    });
    const good = recorder("good", 1);
    scheduler.add_system(bad);
    scheduler.add_system(good);
    scheduler.process_added_systems();

    ctx.events.length = 0;
    expect(() => scheduler.stop()).toThrow("stop failed");
    expect(ctx.events).toEqual(["good.stop"]);
    expect(scheduler.has_system(bad)).toBe(false);
    expect(scheduler.has_system(good)).toBe(false);
    expect(scheduler.active_count).toBe(0);
    expect(error).toHaveBeenCalledOnce();
    vi.restoreAllMocks();
  });

  it("stop skips systems that were never started", () => {
    const { ctx, scheduler } = make_scheduler();
    const started = recorder("started");
    const pending = recorder("pending");
    scheduler.add_system(started);
    scheduler.process_added_systems();
    scheduler.add_system(pending);

    ctx.events.length = 0;
    scheduler.stop();

    expect(ctx.events).toEqual(["started.stop"]);
    expect(scheduler.get_state(pending)).toBe(SYSTEM_STATE.PENDING);
    expect(scheduler.get_state(started)).toBeUndefined();
  });

  it("clear drops systems in every state without calling hooks", () => {
    const { ctx, scheduler } = make_scheduler();
    const active = recorder("active");
    const stopping = recorder("stopping");
    const pending = recorder("pending");
    scheduler.add_system(active);
    scheduler.add_system(stopping);
    scheduler.process_added_systems();
    scheduler.remove_system(stopping);
    scheduler.add_system(pending);

    ctx.events.length = 0;
    scheduler.clear();
    tick(scheduler);

    expect(ctx.events).toEqual([]);
    expect(scheduler.active_count).toBe(0);
    expect(scheduler.pending_count).toBe(0);
    expect(scheduler.removing_count).toBe(0);
    expect(scheduler.has_system(active)).toBe(false);
    expect(scheduler.has_system(stopping)).toBe(false);
    expect(scheduler.has_system(pending)).toBe(false);
  });
});
