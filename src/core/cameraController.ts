// src/core/cameraController.ts
import { vec3, type Vec3 } from "wgpu-matrix";
import type { Camera } from "@/core/camera";

/** Which movement keys are held this frame. */
export interface CameraMovement {
  forward: boolean;
  backward: boolean;
  left: boolean;
  right: boolean;
}

/**
 * Moves a look-at camera around its target: forward/backward dolly the eye
 * along the view direction, left/right orbit it at a constant radius.
 */
export class CameraController {
  /** Units per second. */
  public speed: number;

  constructor(speed = 30.0) {
    this.speed = speed;
  }

  /**
   * Applies one frame of movement to the camera's eye. The target stays put.
   *
   * @param camera The camera to move.
   * @param movement The held movement keys.
   * @param deltaSeconds Time elapsed since the last update.
   */
  public update(
    camera: Camera,
    movement: CameraMovement,
    deltaSeconds: number,
  ): void {
    const step = this.speed * deltaSeconds;
    const toTarget = vec3.subtract(camera.target, camera.eye);
    const forward = vec3.normalize(toTarget);

    // Stop short of the target instead of passing through it.
    if (movement.forward && vec3.length(toTarget) > step) {
      vec3.addScaled(camera.eye, forward, step, camera.eye);
    }
    if (movement.backward) {
      vec3.addScaled(camera.eye, forward, -step, camera.eye);
    }

    const right = vec3.cross(forward, camera.up);

    // The radius after dollying; orbiting keeps it.
    const offset = vec3.subtract(camera.target, camera.eye);
    const radius = vec3.length(offset);

    if (movement.right) {
      this.orbit(camera, vec3.addScaled(offset, right, -step), radius);
    }
    if (movement.left) {
      this.orbit(camera, vec3.addScaled(offset, right, step), radius);
    }
  }

  private orbit(camera: Camera, direction: Vec3, radius: number): void {
    vec3.subtract(
      camera.target,
      vec3.scale(vec3.normalize(direction), radius),
      camera.eye,
    );
  }
}
