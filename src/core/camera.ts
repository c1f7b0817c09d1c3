// src/core/camera.ts
import { type Mat4, mat4, vec3, type Vec3, vec4 } from "wgpu-matrix";
import type { CameraUniformData } from "@/core/types/gpu";

export type Axis = "x" | "y" | "z";

const axisVector = (axis: Axis): Vec3 => {
  switch (axis) {
    case "x":
      return vec3.fromValues(1, 0, 0);
    case "y":
      return vec3.fromValues(0, 1, 0);
    case "z":
      return vec3.fromValues(0, 0, 1);
  }
};

export interface CameraOptions {
  eye?: Vec3;
  target?: Vec3;
  up?: Vec3;
  /** Vertical field of view in degrees. */
  fovYDegrees?: number;
  aspect?: number;
  near?: number;
  far?: number;
}

/**
 * A look-at perspective camera. It determines the viewer's position and
 * orientation (view) and the lens (projection), and produces the data of the
 * camera uniform.
 *
 * The projection maps depth to WebGPU's [0, 1] clip range directly.
 */
export class Camera {
  /** The camera's position in world space. */
  public eye: Vec3;
  public target: Vec3;
  public up: Vec3;
  public fovYDegrees: number;
  public aspect: number;
  public near: number;
  public far: number;

  constructor(options: CameraOptions = {}) {
    // 2 units back, 1 unit up, looking at the origin
    this.eye = vec3.clone(options.eye ?? vec3.fromValues(0, 1, 2));
    this.target = vec3.clone(options.target ?? vec3.fromValues(0, 0, 0));
    this.up = vec3.clone(options.up ?? axisVector("y"));
    this.fovYDegrees = options.fovYDegrees ?? 45;
    this.aspect = options.aspect ?? 16 / 9;
    this.near = options.near ?? 0.1;
    this.far = options.far ?? 100.0;
  }

  /** World space to view space. */
  public get viewMatrix(): Mat4 {
    return mat4.lookAt(this.eye, this.target, this.up);
  }

  /** View space to clip space. */
  public get projectionMatrix(): Mat4 {
    return mat4.perspective(
      (this.fovYDegrees * Math.PI) / 180,
      this.aspect,
      this.near,
      this.far,
    );
  }

  /** Pre-multiplied P * V, as sent to the GPU. */
  public get viewProjectionMatrix(): Mat4 {
    return mat4.multiply(this.projectionMatrix, this.viewMatrix);
  }

  /**
   * Updates the aspect ratio from viewport dimensions.
   */
  public setAspect(width: number, height: number): void {
    this.aspect = width / height;
  }

  public setUpAxis(axis: Axis): void {
    this.up = axisVector(axis);
  }

  /**
   * Moves the eye; the target stays where it is.
   */
  public translate(delta: Vec3): void {
    vec3.add(this.eye, delta, this.eye);
  }

  /**
   * Snapshot of the values the camera uniform carries.
   */
  public toUniformData(): CameraUniformData {
    return {
      viewPosition: vec4.fromValues(this.eye[0], this.eye[1], this.eye[2], 1.0),
      viewProjectionMatrix: this.viewProjectionMatrix,
    };
  }
}
