// tests/textureSampler.test.ts
import { describe, expect, it } from "vitest";
import { vec2, vec4 } from "wgpu-matrix";
import {
  createSolidSampler,
  createTexelSampler,
  type TexelImage,
} from "@/core/rendering/reference/textureSampler";

// 2x2 RGBA8: red, green on the top row; blue, transparent white below.
const checker: TexelImage = {
  width: 2,
  height: 2,
  data: new Uint8Array([
    255, 0, 0, 255, 0, 255, 0, 255,
    0, 0, 255, 255, 255, 255, 255, 0,
  ]),
};

const RED = [1, 0, 0, 1];
const GREEN = [0, 1, 0, 1];
const BLUE = [0, 0, 1, 1];
const CLEAR_WHITE = [1, 1, 1, 0];

describe("texture samplers", () => {
  it("should return the same color everywhere for a solid sampler", () => {
    const sample = createSolidSampler(vec4.create(0.5, 0.25, 1, 1));
    expect(Array.from(sample(vec2.create(0, 0)))).toEqual([0.5, 0.25, 1, 1]);
    expect(Array.from(sample(vec2.create(7, -3)))).toEqual([0.5, 0.25, 1, 1]);
  });

  it("should not let callers mutate a solid sampler's color", () => {
    const sample = createSolidSampler(vec4.create(0, 0, 0, 1));
    sample(vec2.create(0, 0))[0] = 1;
    expect(sample(vec2.create(0, 0))[0]).toBe(0);
  });

  it("should pick the nearest texel", () => {
    const sample = createTexelSampler(checker);
    expect(Array.from(sample(vec2.create(0.25, 0.25)))).toEqual(RED);
    expect(Array.from(sample(vec2.create(0.75, 0.25)))).toEqual(GREEN);
    expect(Array.from(sample(vec2.create(0.25, 0.75)))).toEqual(BLUE);
    expect(Array.from(sample(vec2.create(0.75, 0.75)))).toEqual(CLEAR_WHITE);
  });

  it("should wrap coordinates in repeat mode", () => {
    const sample = createTexelSampler(checker);
    expect(Array.from(sample(vec2.create(1.25, 0.25)))).toEqual(RED);
    expect(Array.from(sample(vec2.create(-0.25, 0.25)))).toEqual(GREEN);
    expect(Array.from(sample(vec2.create(1, 1)))).toEqual(RED);
  });

  it("should clamp coordinates in clamp-to-edge mode", () => {
    const sample = createTexelSampler(checker, {
      addressModeU: "clamp-to-edge",
      addressModeV: "clamp-to-edge",
    });
    expect(Array.from(sample(vec2.create(1.5, 0.25)))).toEqual(GREEN);
    expect(Array.from(sample(vec2.create(-1, 0.25)))).toEqual(RED);
    expect(Array.from(sample(vec2.create(1, 1)))).toEqual(CLEAR_WHITE);
  });

  it("should reject an empty image", () => {
    expect(() =>
      createTexelSampler({ width: 0, height: 2, data: new Uint8Array(0) }),
    ).toThrow("Texel image must not be empty (got 0x2)");
  });

  it("should reject image data that is too short", () => {
    expect(() =>
      createTexelSampler({ width: 2, height: 2, data: new Uint8Array(15) }),
    ).toThrow("Texel image data too short: expected 16 bytes, got 15");
  });
});
