// src/core/rendering/reference/textureSampler.ts
import { vec4, type Vec2, type Vec3, type Vec4 } from "wgpu-matrix";

/**
 * CPU stand-in for a `textureSample` call: maps texture coordinates to an
 * RGBA value in [0, 1].
 */
export type TextureSampler = (uv: Vec2) => Vec4;

/** A tightly packed RGBA8 image, rows top to bottom. */
export interface TexelImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export type TexelAddressMode = "repeat" | "clamp-to-edge";

export interface TexelSamplerOptions {
  addressModeU?: TexelAddressMode;
  addressModeV?: TexelAddressMode;
}

/**
 * Returns a sampler that yields the same color everywhere.
 */
export const createSolidSampler = (color: Vec4): TextureSampler => {
  const value = vec4.clone(color);
  return () => vec4.clone(value);
};

const wrap = (coord: number, mode: TexelAddressMode): number => {
  if (mode === "repeat") return coord - Math.floor(coord);
  return Math.min(Math.max(coord, 0), 1);
};

/**
 * Returns a nearest-filtering sampler over an RGBA8 image. Texels are
 * converted from unorm8 to [0, 1].
 *
 * @param image The image to sample; `data` must hold width * height * 4 bytes.
 * @param options Per-axis address modes, `repeat` by default.
 * @throws If the image is empty or its data is too short.
 */
export const createTexelSampler = (
  image: TexelImage,
  options: TexelSamplerOptions = {},
): TextureSampler => {
  const { width, height, data } = image;
  if (width <= 0 || height <= 0) {
    throw new Error(`Texel image must not be empty (got ${width}x${height})`);
  }
  if (data.length < width * height * 4) {
    throw new Error(
      `Texel image data too short: expected ${width * height * 4} bytes, got ${data.length}`,
    );
  }
  const modeU = options.addressModeU ?? "repeat";
  const modeV = options.addressModeV ?? "repeat";

  return (uv: Vec2): Vec4 => {
    const x = Math.min(Math.floor(wrap(uv[0], modeU) * width), width - 1);
    const y = Math.min(Math.floor(wrap(uv[1], modeV) * height), height - 1);
    const index = (y * width + x) * 4;
    return vec4.create(
      data[index] / 255,
      data[index + 1] / 255,
      data[index + 2] / 255,
      data[index + 3] / 255,
    );
  };
};

/**
 * Encodes a direction in [-1, 1]^3 the way normal maps store it: (d + 1) / 2
 * per channel, with alpha 1.
 */
export const encodeNormal = (direction: Vec3): Vec4 =>
  vec4.create(
    (direction[0] + 1) / 2,
    (direction[1] + 1) / 2,
    (direction[2] + 1) / 2,
    1.0,
  );
