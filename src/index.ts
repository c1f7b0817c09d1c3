// src/index.ts
export type {
  BasicInstance,
  BasicVertex,
  CameraUniformData,
  InstanceByKind,
  LightUniformData,
  LitInstance,
  LitVertex,
  MaterialTexture,
  Mesh,
  PipelineKind,
  ShadingDevice,
  ShadingPassEncoder,
  TypedArray,
  VertexByKind,
} from "./core/types/gpu";
export {
  DEFAULT_LIGHTING_CONFIG,
  type LightingConfig,
  resolveLightingConfig,
  toShaderConstants,
} from "./core/config";
export { type Axis, Camera, type CameraOptions } from "./core/camera";
export {
  CameraController,
  type CameraMovement,
} from "./core/cameraController";
export { PointLight } from "./core/light";
export { createInstanceGrid, Instance } from "./core/instance";
export {
  type BasicMaterialTextures,
  createMaterial,
  type LitMaterialTextures,
  Material,
  type MaterialTexturesByKind,
} from "./core/materials/material";
export { createMesh, interleaveVertices } from "./core/resources/meshFactory";
export {
  BindGroup,
  type BindingSlot,
  CAMERA_UNIFORM_BYTE_SIZE,
  CAMERA_UNIFORM_SLOT,
  getBindGroupLayoutDescriptors,
  getBindingSlots,
  LIGHT_UNIFORM_BYTE_SIZE,
  LIGHT_UNIFORM_SLOT,
  MaterialSlot,
} from "./core/rendering/bindings";
export {
  AttributeLocation,
  getInstanceLayout,
  getMeshVertexLayout,
  getVertexBufferLayouts,
  INSTANCE_BUFFER_SLOT,
  MESH_BUFFER_SLOT,
} from "./core/rendering/layouts";
export { InstanceBufferManager } from "./core/rendering/instanceBufferManager";
export { UniformManager } from "./core/rendering/uniformManager";
export {
  ShadingPipeline,
  type ShadingPipelineOptions,
} from "./core/rendering/shadingPipeline";
export {
  assembleModelMatrix,
  assembleNormalMatrix,
  computeNormalMatrix,
  instanceStrideInFloats,
  packInstance,
  unpackInstance,
} from "./core/rendering/reference/attributeAssembler";
export {
  buildTangentBasis,
  runVertexStage,
  transformToClip,
  type VertexOutput,
  type VertexStageInput,
} from "./core/rendering/reference/vertexStage";
export {
  blinnPhongTerms,
  decodeNormal,
  type FragmentInput,
  runFragmentStage,
} from "./core/rendering/reference/fragmentStage";
export {
  createSolidSampler,
  createTexelSampler,
  encodeNormal,
  type TextureSampler,
} from "./core/rendering/reference/textureSampler";
export { verifyShaderContract } from "./core/shaders/contract";
export {
  ShaderPreprocessor,
  type ShaderSourceReader,
} from "./core/shaders/preprocessor";
export { Shader } from "./core/shaders/shader";
