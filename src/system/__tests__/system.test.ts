import { describe, expect, it, vi } from "vitest";
import { System, as_system_id, define_system } from "../system";
import { Registry } from "../../registry";

class CountingSystem extends System {
  public frames = 0;

  public override update(_registry: Registry, _delta_time: number): void {
    this.frames++;
  }
}

describe("System", () => {
  //=========================================================
  // Class style
  //=========================================================

  it("name defaults to the class name", () => {
    expect(new CountingSystem().name).toBe("CountingSystem");
    expect(new CountingSystem("counter").name).toBe("counter");
  });

  it("starts enabled and can be toggled", () => {
    const system = new CountingSystem();
    expect(system.enabled).toBe(true);

    system.set_enabled(false);
    expect(system.enabled).toBe(false);

    system.set_enabled(true);
    expect(system.enabled).toBe(true);
  });

  it("init and shutdown default to no-ops", () => {
    const registry = new Registry();
    const system = new CountingSystem();

    expect(() => system.init(registry)).not.toThrow();
    expect(() => system.shutdown(registry)).not.toThrow();
    expect(registry.entity_count).toBe(0);
  });

  //=========================================================
  // Function style
  //=========================================================

  it("define_system forwards every hook", () => {
    const init = vi.fn();
    const update = vi.fn();
    const shutdown = vi.fn();
    const registry = new Registry();
    const system = define_system({ name: "hooks", init, update, shutdown });

    system.init(registry);
    system.update(registry, 0.25);
    system.shutdown(registry);

    expect(init).toHaveBeenCalledWith(registry);
    expect(update).toHaveBeenCalledWith(registry, 0.25);
    expect(shutdown).toHaveBeenCalledWith(registry);
  });

  it("define_system names the system after its update function", () => {
    function spin(_registry: Registry, _dt: number): void {}

    expect(define_system({ update: spin }).name).toBe("spin");
    expect(define_system({ name: "explicit", update: spin }).name).toBe(
      "explicit",
    );
  });

  it("define_system honours enabled: false", () => {
    const system = define_system({ update: () => {}, enabled: false });
    expect(system.enabled).toBe(false);
  });

  it("a defined system can mutate the registry it is handed", () => {
    const registry = new Registry();
    const spawner = define_system({
      update: (r) => {
        r.create_entity();
      },
    });

    spawner.update(registry, 1);
    spawner.update(registry, 1);

    expect(registry.entity_count).toBe(2);
  });
});

describe("as_system_id", () => {
  it("accepts non-negative integers", () => {
    expect(as_system_id(0)).toBe(0);
    expect(as_system_id(12)).toBe(12);
  });

  it("rejects negative and fractional values", () => {
    expect(() => as_system_id(-1)).toThrow();
    expect(() => as_system_id(1.5)).toThrow();
  });
});
