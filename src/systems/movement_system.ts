import { System } from "../system/system";
import type { Registry } from "../registry";
import { TransformComponent, VelocityComponent } from "../components/spatial";

/** Integrates linear velocity into transform position: p += v * dt. */
export class MovementSystem extends System {
  public override update(registry: Registry, delta_time: number): void {
    registry.view(
      [TransformComponent, VelocityComponent],
      (_id, transform, velocity) => {
        transform.position.x += velocity.linear.x * delta_time;
        transform.position.y += velocity.linear.y * delta_time;
        transform.position.z += velocity.linear.z * delta_time;
      },
    );
  }
}
