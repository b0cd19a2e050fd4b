/***
 * Spatial components — position, orientation, scale and velocity.
 *
 * The physics collaborator reads TransformComponent each tick and writes
 * the resolved position back; it never creates or destroys entities.
 *
 ***/

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Quaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

export const vec3 = (x = 0, y = 0, z = 0): Vector3 => ({ x, y, z });

export const identity_quaternion = (): Quaternion => ({
  x: 0,
  y: 0,
  z: 0,
  w: 1,
});

/** World-space position, orientation and non-uniform scale. */
export class TransformComponent {
  constructor(
    public position: Vector3 = vec3(),
    public rotation: Quaternion = identity_quaternion(),
    public scale: Vector3 = vec3(1, 1, 1),
  ) {}
}

/** Linear velocity in units/s and angular velocity as Euler rates in rad/s. */
export class VelocityComponent {
  constructor(
    public linear: Vector3 = vec3(),
    public angular: Vector3 = vec3(),
  ) {}
}
