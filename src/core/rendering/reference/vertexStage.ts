// src/core/rendering/reference/vertexStage.ts
import {
  mat3,
  type Mat3,
  type Mat4,
  vec2,
  type Vec2,
  vec3,
  type Vec3,
  vec4,
  type Vec4,
} from "wgpu-matrix";
import type {
  BasicInstance,
  BasicVertex,
  CameraUniformData,
  LightUniformData,
  LitInstance,
  LitVertex,
} from "@/core/types/gpu";
import { assembleNormalMatrix } from "./attributeAssembler";

export interface BasicVertexStageInput {
  kind: "basic";
  vertex: BasicVertex;
  instance: BasicInstance;
  camera: CameraUniformData;
}

export interface LitVertexStageInput {
  kind: "lit";
  vertex: LitVertex;
  instance: LitInstance;
  camera: CameraUniformData;
  light: LightUniformData;
}

export type VertexStageInput = BasicVertexStageInput | LitVertexStageInput;

export interface BasicVertexOutput {
  kind: "basic";
  /** Consumed by the rasterizer only. */
  clipPosition: Vec4;
  texCoords: Vec2;
}

export interface LitVertexOutput {
  kind: "lit";
  clipPosition: Vec4;
  texCoords: Vec2;
  tangentPosition: Vec3;
  tangentLightPosition: Vec3;
  tangentViewPosition: Vec3;
}

export type VertexOutput = BasicVertexOutput | LitVertexOutput;

/**
 * Object -> world -> clip transform shared by both pipelines.
 *
 * @param modelMatrix The instance's object to world transform.
 * @param position The object-space vertex position (w is taken as 1).
 * @param camera The camera uniform.
 */
export const transformToClip = (
  modelMatrix: Mat4,
  position: Vec3,
  camera: CameraUniformData,
): { worldPosition: Vec4; clipPosition: Vec4 } => {
  const worldPosition = vec4.transformMat4(
    vec4.create(position[0], position[1], position[2], 1.0),
    modelMatrix,
  );
  const clipPosition = vec4.transformMat4(
    worldPosition,
    camera.viewProjectionMatrix,
  );
  return { worldPosition, clipPosition };
};

/**
 * Builds the world -> tangent space matrix for a vertex.
 *
 * The normal, tangent and bitangent are moved to world space through the
 * normal matrix and renormalized. The result has them as its rows, i.e. it is
 * the transpose of the matrix whose columns are (T, B, N).
 */
export const buildTangentBasis = (
  normalMatrix: Mat3,
  vertex: Pick<LitVertex, "normal" | "tangent" | "bitangent">,
): Mat3 => {
  const worldNormal = vec3.normalize(
    vec3.transformMat3(vertex.normal, normalMatrix),
  );
  const worldTangent = vec3.normalize(
    vec3.transformMat3(vertex.tangent, normalMatrix),
  );
  const worldBitangent = vec3.normalize(
    vec3.transformMat3(vertex.bitangent, normalMatrix),
  );

  const columns = assembleNormalMatrix(worldTangent, worldBitangent, worldNormal);
  return mat3.transpose(columns, columns);
};

/**
 * CPU reference of `vs_main` for both pipelines.
 *
 * @remarks
 * The output is a pure function of the input: calling it twice with the same
 * data gives identical results and nothing is cached between calls.
 */
export function runVertexStage(input: BasicVertexStageInput): BasicVertexOutput;
export function runVertexStage(input: LitVertexStageInput): LitVertexOutput;
export function runVertexStage(input: VertexStageInput): VertexOutput;
export function runVertexStage(input: VertexStageInput): VertexOutput {
  const { clipPosition, worldPosition } = transformToClip(
    input.instance.modelMatrix,
    input.vertex.position,
    input.camera,
  );
  const texCoords = vec2.clone(input.vertex.texCoords);

  if (input.kind === "basic") {
    return { kind: "basic", clipPosition, texCoords };
  }

  const tangentMatrix = buildTangentBasis(input.instance.normalMatrix, input.vertex);
  const viewPosition = input.camera.viewPosition;

  return {
    kind: "lit",
    clipPosition,
    texCoords,
    tangentPosition: vec3.transformMat3(
      vec3.create(worldPosition[0], worldPosition[1], worldPosition[2]),
      tangentMatrix,
    ),
    tangentViewPosition: vec3.transformMat3(
      vec3.create(viewPosition[0], viewPosition[1], viewPosition[2]),
      tangentMatrix,
    ),
    tangentLightPosition: vec3.transformMat3(input.light.position, tangentMatrix),
  };
}
