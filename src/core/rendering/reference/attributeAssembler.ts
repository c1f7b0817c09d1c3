// src/core/rendering/reference/attributeAssembler.ts
import { mat3, type Mat3, mat4, type Mat4, type Vec3, type Vec4 } from "wgpu-matrix";
import type {
  BasicInstance,
  InstanceByKind,
  LitInstance,
  PipelineKind,
} from "@/core/types/gpu";

/** Floats occupied by the model matrix lanes (4 x vec4). */
const MODEL_MATRIX_FLOATS = 16;
/** Floats occupied by the normal matrix lanes (3 x vec3, unpadded). */
const NORMAL_MATRIX_FLOATS = 9;

/**
 * Number of floats a single instance occupies in the instance stream.
 */
export const instanceStrideInFloats = (kind: PipelineKind): number =>
  kind === "lit"
    ? MODEL_MATRIX_FLOATS + NORMAL_MATRIX_FLOATS
    : MODEL_MATRIX_FLOATS;

/**
 * Rebuilds a 4x4 matrix from the four vec4 lanes of an instance, taking each
 * lane as one column. Mirrors `assemble_model_matrix` in `instance.wgsl`.
 *
 * No invertibility check is made; a singular input is returned as is.
 */
export const assembleModelMatrix = (
  c0: Vec4,
  c1: Vec4,
  c2: Vec4,
  c3: Vec4,
  dst: Mat4 = mat4.create(),
): Mat4 => {
  const columns = [c0, c1, c2, c3];
  for (let col = 0; col < 4; col++) {
    for (let row = 0; row < 4; row++) {
      dst[col * 4 + row] = columns[col][row];
    }
  }
  return dst;
};

/**
 * Rebuilds a 3x3 matrix from the three vec3 lanes of an instance, taking each
 * lane as one column. Mirrors `assemble_normal_matrix` in `instance.wgsl`.
 *
 * wgpu-matrix pads each mat3 column to 4 floats, hence the stride of 4.
 */
export const assembleNormalMatrix = (
  c0: Vec3,
  c1: Vec3,
  c2: Vec3,
  dst: Mat3 = mat3.create(),
): Mat3 => {
  const columns = [c0, c1, c2];
  for (let col = 0; col < 3; col++) {
    for (let row = 0; row < 3; row++) {
      dst[col * 4 + row] = columns[col][row];
    }
    dst[col * 4 + 3] = 0;
  }
  return dst;
};

/**
 * Computes the normal matrix of a model matrix: the inverse-transpose of its
 * upper 3x3 block.
 *
 * A singular block yields a degenerate result rather than an error.
 */
export const computeNormalMatrix = (
  modelMatrix: Mat4,
  dst: Mat3 = mat3.create(),
): Mat3 => {
  const upper = mat3.fromMat4(modelMatrix);
  mat3.inverse(upper, dst);
  return mat3.transpose(dst, dst);
};

/**
 * Flattens one instance into the lane order read back by the shaders:
 * model matrix columns first, then (lit only) the three normal matrix
 * columns without padding.
 *
 * @param kind The pipeline the instance stream feeds.
 * @param instance The instance transforms.
 * @param target The CPU-side staging array.
 * @param floatOffset Where the instance starts in `target`, in floats.
 * @throws If a lit instance carries no normal matrix.
 */
export function packInstance<K extends PipelineKind>(
  kind: K,
  instance: InstanceByKind[K],
  target: Float32Array,
  floatOffset: number,
): void;
export function packInstance(
  kind: PipelineKind,
  instance: BasicInstance | LitInstance,
  target: Float32Array,
  floatOffset: number,
): void {
  const normalMatrix =
    "normalMatrix" in instance ? instance.normalMatrix : undefined;
  if (kind === "lit" && !normalMatrix) {
    throw new Error(
      `Lit instance ${floatOffset / instanceStrideInFloats(kind)} has no normal matrix`,
    );
  }

  target.set(instance.modelMatrix, floatOffset);

  if (kind !== "lit" || !normalMatrix) return;

  const base = floatOffset + MODEL_MATRIX_FLOATS;
  for (let col = 0; col < 3; col++) {
    for (let row = 0; row < 3; row++) {
      target[base + col * 3 + row] = normalMatrix[col * 4 + row];
    }
  }
}

/**
 * Reads one instance back out of a flat instance stream, the way the vertex
 * stage sees it.
 */
export function unpackInstance<K extends PipelineKind>(
  kind: K,
  source: Float32Array,
  floatOffset: number,
): InstanceByKind[K];
export function unpackInstance(
  kind: PipelineKind,
  source: Float32Array,
  floatOffset: number,
): InstanceByKind[PipelineKind] {
  const lane = (start: number, size: number) =>
    source.subarray(floatOffset + start, floatOffset + start + size);

  const modelMatrix = assembleModelMatrix(
    lane(0, 4),
    lane(4, 4),
    lane(8, 4),
    lane(12, 4),
  );
  if (kind === "basic") return { modelMatrix };

  const normalMatrix = assembleNormalMatrix(
    lane(16, 3),
    lane(19, 3),
    lane(22, 3),
  );
  return { modelMatrix, normalMatrix };
}
