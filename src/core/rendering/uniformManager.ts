// src/core/rendering/uniformManager.ts
import type {
  CameraUniformData,
  LightUniformData,
  ShadingDevice,
} from "@/core/types/gpu";
import {
  CAMERA_UNIFORM_BYTE_SIZE,
  LIGHT_UNIFORM_BYTE_SIZE,
} from "./bindings";

/**
 * Packs camera and light data into staging arrays laid out exactly like the
 * WGSL `Camera` and `Light` structs, and queues their upload.
 *
 * The staging arrays are allocated once and reused every frame.
 */
export class UniformManager {
  private readonly cameraDataArray = new Float32Array(
    CAMERA_UNIFORM_BYTE_SIZE / Float32Array.BYTES_PER_ELEMENT,
  );
  private readonly lightDataArray = new Float32Array(
    LIGHT_UNIFORM_BYTE_SIZE / Float32Array.BYTES_PER_ELEMENT,
  );

  /**
   * Packs the camera uniform.
   *
   * @remarks
   * | Offset (Floats) | Member          | Type          |
   * |:----------------|:----------------|:--------------|
   * | 0-3             | `view_position` | `vec4<f32>`   |
   * | 4-19            | `view_proj`     | `mat4x4<f32>` |
   *
   * @returns The internal staging array; valid until the next call.
   */
  public packCamera(camera: CameraUniformData): Float32Array {
    this.cameraDataArray.set(camera.viewPosition, 0);
    this.cameraDataArray.set(camera.viewProjectionMatrix, 4);
    return this.cameraDataArray;
  }

  /**
   * Packs the light uniform.
   *
   * @remarks
   * | Offset (Floats) | Member     | Type        |
   * |:----------------|:-----------|:------------|
   * | 0-2             | `position` | `vec3<f32>` |
   * | 3               | padding    |             |
   * | 4-6             | `color`    | `vec3<f32>` |
   * | 7               | padding    |             |
   *
   * @returns The internal staging array; valid until the next call.
   */
  public packLight(light: LightUniformData): Float32Array {
    this.lightDataArray.set(light.position, 0);
    this.lightDataArray[3] = 0.0;
    this.lightDataArray.set(light.color, 4);
    this.lightDataArray[7] = 0.0;
    return this.lightDataArray;
  }

  public updateCameraUniform(
    device: ShadingDevice,
    buffer: GPUBuffer,
    camera: CameraUniformData,
  ): void {
    device.queue.writeBuffer(buffer, 0, this.packCamera(camera));
  }

  public updateLightUniform(
    device: ShadingDevice,
    buffer: GPUBuffer,
    light: LightUniformData,
  ): void {
    device.queue.writeBuffer(buffer, 0, this.packLight(light));
  }
}
