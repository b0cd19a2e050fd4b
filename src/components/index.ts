export {
  TransformComponent,
  VelocityComponent,
  vec3,
  identity_quaternion,
  type Vector3,
  type Quaternion,
} from "./spatial";
export { TagComponent } from "./identity";
export {
  HealthComponent,
  LifetimeComponent,
  PlayerComponent,
  type PlayerController,
} from "./gameplay";
