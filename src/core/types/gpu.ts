// src/core/types/gpu.ts
import type { Mat3, Mat4, Vec2, Vec3, Vec4 } from "wgpu-matrix";

/**
 * A union of all possible TypedArray constructors that can be used for GPU
 * buffers.
 */
export type TypedArray =
  | Float32Array
  | Uint32Array
  | Uint16Array
  | Int32Array
  | Int16Array
  | Int8Array
  | Uint8Array;

/**
 * Selects one of the two shading paths.
 *
 * - `basic`: diffuse texture only, no lighting.
 * - `lit`: diffuse + normal map, tangent-space Blinn-Phong with one light.
 */
export type PipelineKind = "basic" | "lit";

/** Object-space attributes of a vertex drawn by the basic pipeline. */
export interface BasicVertex {
  position: Vec3;
  texCoords: Vec2;
}

/** Object-space attributes of a vertex drawn by the lit pipeline. */
export interface LitVertex extends BasicVertex {
  normal: Vec3;
  tangent: Vec3;
  bitangent: Vec3;
}

/** Per-instance transform state for the basic pipeline. */
export interface BasicInstance {
  /** Object to world transform. */
  modelMatrix: Mat4;
}

/** Per-instance transform state for the lit pipeline. */
export interface LitInstance extends BasicInstance {
  /**
   * Inverse-transpose of the model matrix's upper 3x3 block. Must be kept
   * consistent with `modelMatrix` or lighting breaks under non-uniform scale.
   */
  normalMatrix: Mat3;
}

export interface VertexByKind {
  basic: BasicVertex;
  lit: LitVertex;
}

export interface InstanceByKind {
  basic: BasicInstance;
  lit: LitInstance;
}

/**
 * Scene-wide camera state as seen by the shaders.
 */
export interface CameraUniformData {
  /** World-space eye position, w=1 for padding purposes. */
  viewPosition: Vec4;
  /** World to clip transform. */
  viewProjectionMatrix: Mat4;
}

/**
 * Scene-wide light state as seen by the lit shaders.
 */
export interface LightUniformData {
  /** World-space light position. */
  position: Vec3;
  /** Linear RGB intensity. */
  color: Vec3;
}

/**
 * Represents mesh geometry uploaded for one of the pipelines. The vertex
 * buffer is interleaved in the layout of the matching pipeline kind.
 */
export interface Mesh {
  kind: PipelineKind;
  vertexBuffer: GPUBuffer;
  vertexCount: number;
  indexBuffer?: GPUBuffer;
  indexFormat?: GPUIndexFormat;
  indexCount?: number;
}

/** A texture view and the sampler it is read with. */
export interface MaterialTexture {
  view: GPUTextureView;
  sampler: GPUSampler;
}

/**
 * The part of a `GPUDevice` the shading core calls into. A real device
 * satisfies it as is.
 */
export interface ShadingDevice
  extends Pick<
    GPUDevice,
    | "createBuffer"
    | "createShaderModule"
    | "createBindGroupLayout"
    | "createBindGroup"
    | "createPipelineLayout"
    | "createRenderPipeline"
  > {
  readonly queue: Pick<GPUQueue, "writeBuffer">;
}

/** The render pass commands issued for a draw. */
export type ShadingPassEncoder = Pick<
  GPURenderPassEncoder,
  | "setPipeline"
  | "setBindGroup"
  | "setVertexBuffer"
  | "setIndexBuffer"
  | "draw"
  | "drawIndexed"
>;
