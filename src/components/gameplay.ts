/***
 * Gameplay components — health, lifetime and the player link.
 *
 ***/

import type { Vector3 } from "./spatial";

/** Health pool. current is clamped to [0, max] by the helpers. */
export class HealthComponent {
  constructor(
    public current = 100,
    public max = 100,
  ) {}

  is_dead(): boolean {
    return this.current <= 0;
  }

  /** current / max, or 0 for a zero max. */
  normalised(): number {
    return this.max > 0 ? this.current / this.max : 0;
  }

  apply_damage(amount: number): void {
    this.current -= amount;
    if (this.current < 0) this.current = 0;
  }

  heal(amount: number): void {
    this.current += amount;
    if (this.current > this.max) this.current = this.max;
  }
}

/** Seconds left before LifetimeSystem destroys the entity. */
export class LifetimeComponent {
  constructor(public remaining = 1) {}
}

/**
 * The engine-side player controller. Owned by the host; components only
 * ever hold a non-owning reference to it.
 */
export interface PlayerController {
  position: Vector3;
  enable_source_bhop: boolean;
  set_source_bhop_enabled(enabled: boolean): void;
}

/**
 * Marks the locally controlled player. Never added implicitly.
 * `player` is null in headless runs; every player-specific binding
 * then does nothing.
 */
export class PlayerComponent {
  constructor(
    public player: PlayerController | null = null,
    public enable_source_bhop = false,
    public speed_multiplier = 1,
    public jump_multiplier = 1,
  ) {}
}
