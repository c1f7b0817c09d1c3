// src/core/light.ts
import { quat, vec3, type Vec3 } from "wgpu-matrix";
import type { LightUniformData } from "@/core/types/gpu";

const WORLD_UP = vec3.fromValues(0, 1, 0);

/**
 * The single light of the lit pipeline: a world-space position and a linear
 * RGB color.
 */
export class PointLight {
  public position: Vec3;
  public color: Vec3;

  constructor(
    position: Vec3 = vec3.fromValues(2, 2, 2),
    color: Vec3 = vec3.fromValues(1, 1, 1),
  ) {
    this.position = vec3.clone(position);
    this.color = vec3.clone(color);
  }

  public setPosition(position: Vec3): void {
    vec3.copy(position, this.position);
  }

  public setColor(color: Vec3): void {
    vec3.copy(color, this.color);
  }

  /**
   * Rotates the light about the world Y axis through the origin.
   *
   * @param degreesPerSecond Angular speed, positive is counter-clockwise
   *   seen from above.
   * @param deltaSeconds Time elapsed since the last update.
   */
  public orbit(degreesPerSecond: number, deltaSeconds: number): void {
    const angle = (degreesPerSecond * deltaSeconds * Math.PI) / 180;
    const rotation = quat.fromAxisAngle(WORLD_UP, angle);
    vec3.transformQuat(this.position, rotation, this.position);
  }

  public toUniformData(): LightUniformData {
    return {
      position: vec3.clone(this.position),
      color: vec3.clone(this.color),
    };
  }
}
