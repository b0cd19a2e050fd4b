import { describe, expect, it, vi } from "vitest";
import { Registry } from "../registry";
import { type EntityID, get_entity_index } from "../entity/entity";
import { ECS_ERROR, is_ecs_error } from "utils/error";

class Position {
  constructor(
    public x = 0,
    public y = 0,
  ) {}
}

class Velocity {
  constructor(
    public vx = 0,
    public vy = 0,
  ) {}
}

class Health {
  constructor(public hp = 100) {}
}

describe("Registry queries", () => {
  //=========================================================
  // each
  //=========================================================

  it("each visits every owner in dense order", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    registry.add_component(a, Position, 1, 0);
    registry.add_component(c, Position, 3, 0);
    registry.add_component(b, Position, 2, 0);

    const visited: [EntityID, number][] = [];
    registry.each(Position, (id, pos) => visited.push([id, pos.x]));

    expect(visited).toEqual([
      [a, 1],
      [c, 3],
      [b, 2],
    ]);
  });

  it("each over a never-used type visits nothing", () => {
    const registry = new Registry();
    registry.create_entity();
    const fn = vi.fn();

    registry.each(Position, fn);

    expect(fn).not.toHaveBeenCalled();
    expect(registry.component_types).toEqual([]);
  });

  it("each hands out the stored component, not a copy", () => {
    const registry = new Registry();
    const e = registry.create_entity();
    registry.add_component(e, Health, 50);

    registry.each(Health, (_id, health) => {
      health.hp -= 10;
    });

    expect(registry.get_component(e, Health).hp).toBe(40);
  });

  it("each skips an entity destroyed before its turn", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    for (const e of [a, b, c]) registry.add_component(e, Position);

    const visited: EntityID[] = [];
    registry.each(Position, (id) => {
      visited.push(id);
      if (id === a) registry.destroy_entity(c);
    });

    expect(visited).toEqual([a, b]);
  });

  it("each survives the visited entity destroying itself", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    registry.add_component(a, Position, 1, 0);
    registry.add_component(b, Position, 2, 0);
    registry.add_component(c, Position, 3, 0);

    const xs: number[] = [];
    registry.each(Position, (id, pos) => {
      xs.push(pos.x);
      registry.destroy_entity(id);
    });

    expect(xs).toEqual([1, 2, 3]);
    expect(registry.entity_count).toBe(0);
    expect(registry.pool(Position).size).toBe(0);
  });

  it("each skips an entity whose component was removed before its turn", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    for (const e of [a, b, c]) registry.add_component(e, Position);

    const visited: EntityID[] = [];
    registry.each(Position, (id) => {
      visited.push(id);
      if (id === a) registry.remove_component(b, Position);
    });

    expect(visited).toEqual([a, c]);
  });

  it("each never visits entities created during the walk, even in a reused slot", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    registry.add_component(a, Position);
    registry.add_component(b, Position);

    let spawned: EntityID | undefined;
    const visited: EntityID[] = [];
    registry.each(Position, (id) => {
      visited.push(id);
      if (id === a) {
        registry.destroy_entity(b);
        spawned = registry.create_entity();
        registry.add_component(spawned, Position);
      }
    });

    expect(spawned).toBeDefined();
    expect(get_entity_index(spawned ?? a)).toBe(get_entity_index(b));
    expect(visited).toEqual([a]);
  });

  //=========================================================
  // view
  //=========================================================

  it("view visits only entities owning every listed type", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    registry.add_component(a, Position);
    registry.add_component(a, Velocity);
    registry.add_component(b, Position);
    registry.add_component(c, Velocity);

    const visited: EntityID[] = [];
    registry.view([Position, Velocity], (id) => visited.push(id));

    expect(visited).toEqual([a]);
  });

  it("view passes components in argument order", () => {
    const registry = new Registry();
    const e = registry.create_entity();
    const pos = registry.add_component(e, Position, 1, 2);
    const vel = registry.add_component(e, Velocity, 3, 4);
    const hp = registry.add_component(e, Health, 5);

    const fn = vi.fn();
    registry.view([Velocity, Health, Position], fn);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(e, vel, hp, pos);
  });

  it("view components are typed per position", () => {
    const registry = new Registry();
    const e = registry.create_entity();
    registry.add_component(e, Position, 0, 0);
    registry.add_component(e, Velocity, 2, -1);

    registry.view([Position, Velocity], (_id, pos, vel) => {
      pos.x += vel.vx;
      pos.y += vel.vy;
    });

    expect(registry.get_component(e, Position)).toEqual(new Position(2, -1));
  });

  it("view is driven by the smaller pool", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    for (const e of [a, b, c]) registry.add_component(e, Position);
    registry.add_component(c, Velocity);
    registry.add_component(a, Velocity);

    const forward: EntityID[] = [];
    const backward: EntityID[] = [];
    registry.view([Position, Velocity], (id) => forward.push(id));
    registry.view([Velocity, Position], (id) => backward.push(id));

    // Velocity's dense order is [c, a] whichever way the types are listed
    expect(forward).toEqual([c, a]);
    expect(backward).toEqual([c, a]);
  });

  it("view breaks a size tie in favour of the first listed type", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    const c = registry.create_entity();
    for (const e of [a, b, c]) registry.add_component(e, Position);
    registry.remove_component(b, Position);
    registry.add_component(c, Velocity);
    registry.add_component(a, Velocity);

    const position_first: EntityID[] = [];
    const velocity_first: EntityID[] = [];
    registry.view([Position, Velocity], (id) => position_first.push(id));
    registry.view([Velocity, Position], (id) => velocity_first.push(id));

    // Position's dense order is [a, c]; Velocity's is [c, a]
    expect(position_first).toEqual([a, c]);
    expect(velocity_first).toEqual([c, a]);
  });

  it("view with a never-used type visits nothing and creates no pool", () => {
    const registry = new Registry();
    const e = registry.create_entity();
    registry.add_component(e, Position);
    const fn = vi.fn();

    registry.view([Position, Velocity], fn);

    expect(fn).not.toHaveBeenCalled();
    expect(registry.component_types).toEqual([Position]);
  });

  it("view with an empty pool visits nothing", () => {
    const registry = new Registry();
    const e = registry.create_entity();
    registry.add_component(e, Position);
    registry.add_component(e, Velocity);
    registry.remove_component(e, Velocity);
    const fn = vi.fn();

    registry.view([Position, Velocity], fn);

    expect(fn).not.toHaveBeenCalled();
  });

  it("view over a single type matches each", () => {
    const registry = new Registry();
    for (let i = 0; i < 4; i++) {
      registry.add_component(registry.create_entity(), Position, i, 0);
    }

    const from_each: number[] = [];
    const from_view: number[] = [];
    registry.each(Position, (_id, pos) => from_each.push(pos.x));
    registry.view([Position], (_id, pos) => from_view.push(pos.x));

    expect(from_view).toEqual(from_each);
  });

  it("view skips entities destroyed during the walk", () => {
    const registry = new Registry();
    const a = registry.create_entity();
    const b = registry.create_entity();
    for (const e of [a, b]) {
      registry.add_component(e, Position);
      registry.add_component(e, Velocity);
    }

    const visited: EntityID[] = [];
    registry.view([Position, Velocity], (id) => {
      visited.push(id);
      registry.destroy_entity(b);
    });

    expect(visited).toEqual([a]);
  });

  it("view with no types throws EMPTY_VIEW", () => {
    const registry = new Registry();
    let category: ECS_ERROR | undefined;
    try {
      registry.view([], () => {});
    } catch (e) {
      if (is_ecs_error(e)) category = e.category;
    }
    expect(category).toBe(ECS_ERROR.EMPTY_VIEW);
  });

  //=========================================================
  // End to end
  //=========================================================

  it("tracks membership through destroy and slot reuse", () => {
    const registry = new Registry();
    const e1 = registry.create_entity();
    const e2 = registry.create_entity();
    const e3 = registry.create_entity();
    registry.add_component(e1, Position, 1, 1);
    registry.add_component(e2, Position, 2, 2);
    registry.add_component(e3, Position, 3, 3);
    registry.add_component(e1, Velocity);
    registry.add_component(e3, Velocity);

    const moving: EntityID[] = [];
    registry.view([Position, Velocity], (id) => moving.push(id));
    expect(moving).toEqual([e1, e3]);

    registry.destroy_entity(e2);

    const positioned: [EntityID, number, number][] = [];
    registry.each(Position, (id, pos) => positioned.push([id, pos.x, pos.y]));
    expect(positioned).toEqual([
      [e1, 1, 1],
      [e3, 3, 3],
    ]);

    const e4 = registry.create_entity();
    expect(get_entity_index(e4)).toBe(get_entity_index(e2));
    expect(e4).not.toBe(e2);
    expect(registry.is_alive(e2)).toBe(false);
    expect(registry.is_alive(e4)).toBe(true);
  });
});
