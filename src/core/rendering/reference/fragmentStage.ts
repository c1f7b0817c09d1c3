// src/core/rendering/reference/fragmentStage.ts
import { vec3, type Vec2, type Vec3, vec4, type Vec4 } from "wgpu-matrix";
import type { LightingConfig } from "@/core/config";
import type { LightUniformData } from "@/core/types/gpu";
import type { LitVertexOutput } from "./vertexStage";
import type { TextureSampler } from "./textureSampler";

export interface BasicFragmentInput {
  kind: "basic";
  texCoords: Vec2;
  diffuse: TextureSampler;
}

export interface LitFragmentInput {
  kind: "lit";
  /** Interpolated vertex outputs for the pixel. */
  interpolants: Omit<LitVertexOutput, "kind" | "clipPosition">;
  diffuse: TextureSampler;
  normal: TextureSampler;
  light: LightUniformData;
  lighting: LightingConfig;
}

export type FragmentInput = BasicFragmentInput | LitFragmentInput;

/** The three Blinn-Phong contributions, before modulation by the albedo. */
export interface BlinnPhongTerms {
  ambient: Vec3;
  diffuse: Vec3;
  specular: Vec3;
}

/**
 * Maps a normal map texel from [0, 1] to a direction in [-1, 1].
 *
 * The result is not renormalized; normal maps are expected to be normalized
 * by the asset pipeline.
 */
export const decodeNormal = (sample: Vec4): Vec3 =>
  vec3.create(sample[0] * 2 - 1, sample[1] * 2 - 1, sample[2] * 2 - 1);

/**
 * Evaluates the ambient, diffuse and specular terms for one pixel.
 * Mirrors `blinn_phong` in `blinnPhong.wgsl`.
 *
 * @param normal Decoded tangent-space normal.
 * @param lightDir Unit vector from the surface towards the light.
 * @param viewDir Unit vector from the surface towards the eye.
 * @param lightColor Linear RGB light intensity.
 * @param config Ambient strength and specular exponent.
 */
export const blinnPhongTerms = (
  normal: Vec3,
  lightDir: Vec3,
  viewDir: Vec3,
  lightColor: Vec3,
  config: LightingConfig,
): BlinnPhongTerms => {
  // Opposite light and view directions sum to zero; wgpu-matrix normalizes
  // that to the zero vector (no highlight) where WGSL leaves it undefined.
  const halfDir = vec3.normalize(vec3.add(viewDir, lightDir));

  const diffuseStrength = Math.max(vec3.dot(normal, lightDir), 0.0);
  const specularStrength = Math.pow(
    Math.max(vec3.dot(normal, halfDir), 0.0),
    config.shininess,
  );

  return {
    ambient: vec3.scale(lightColor, config.ambientStrength),
    diffuse: vec3.scale(lightColor, diffuseStrength),
    specular: vec3.scale(lightColor, specularStrength),
  };
};

/**
 * CPU reference of `fs_main` for both pipelines.
 *
 * @remarks
 * The lit result is not clamped to [0, 1]; values above 1 are passed on as
 * they are, leaving any tone mapping to whatever consumes the color target.
 */
export const runFragmentStage = (input: FragmentInput): Vec4 => {
  if (input.kind === "basic") {
    return input.diffuse(input.texCoords);
  }

  const { interpolants, light, lighting } = input;
  const objectColor = input.diffuse(interpolants.texCoords);
  const tangentNormal = decodeNormal(input.normal(interpolants.texCoords));

  const lightDir = vec3.normalize(
    vec3.subtract(interpolants.tangentLightPosition, interpolants.tangentPosition),
  );
  const viewDir = vec3.normalize(
    vec3.subtract(interpolants.tangentViewPosition, interpolants.tangentPosition),
  );

  const terms = blinnPhongTerms(
    tangentNormal,
    lightDir,
    viewDir,
    light.color,
    lighting,
  );
  const result = vec3.multiply(
    vec3.add(vec3.add(terms.ambient, terms.diffuse), terms.specular),
    vec3.create(objectColor[0], objectColor[1], objectColor[2]),
  );

  return vec4.create(result[0], result[1], result[2], objectColor[3]);
};
