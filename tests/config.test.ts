// tests/config.test.ts
import { describe, expect, it } from "vitest";
import {
  DEFAULT_LIGHTING_CONFIG,
  resolveLightingConfig,
  toShaderConstants,
} from "@/core/config";

describe("lighting config", () => {
  it("should default to ambient 0.1 and shininess 32", () => {
    expect(resolveLightingConfig()).toEqual({
      ambientStrength: 0.1,
      shininess: 32,
    });
    expect(DEFAULT_LIGHTING_CONFIG.shininess).toBe(32);
  });

  it("should override only the given values", () => {
    expect(resolveLightingConfig({ shininess: 8 })).toEqual({
      ambientStrength: 0.1,
      shininess: 8,
    });
  });

  it("should accept zero", () => {
    expect(resolveLightingConfig({ ambientStrength: 0, shininess: 0 })).toEqual({
      ambientStrength: 0,
      shininess: 0,
    });
  });

  it("should reject negative values", () => {
    expect(() => resolveLightingConfig({ shininess: -1 })).toThrow(
      "Invalid lighting config: shininess must be a finite, non-negative number (got -1)",
    );
  });

  it("should reject values that are not finite", () => {
    expect(() => resolveLightingConfig({ ambientStrength: Number.NaN })).toThrow(
      "Invalid lighting config: ambientStrength must be a finite, non-negative number (got NaN)",
    );
    expect(() =>
      resolveLightingConfig({ shininess: Number.POSITIVE_INFINITY }),
    ).toThrow("(got Infinity)");
  });

  it("should name the shader override constants", () => {
    expect(toShaderConstants({ ambientStrength: 0.2, shininess: 16 })).toEqual({
      ambient_strength: 0.2,
      shininess: 16,
    });
  });
});
