// tests/light.test.ts
import { describe, expect, it } from "vitest";
import { vec3 } from "wgpu-matrix";
import { PointLight } from "@/core/light";

describe("PointLight", () => {
  it("should default to a white light at (2, 2, 2)", () => {
    const light = new PointLight();
    expect(Array.from(light.position)).toEqual([2, 2, 2]);
    expect(Array.from(light.color)).toEqual([1, 1, 1]);
  });

  it("should orbit counter-clockwise about the Y axis", () => {
    const light = new PointLight(vec3.create(2, 1, 0));
    light.orbit(30, 3);
    expect(light.position[0]).toBeCloseTo(0, 5);
    expect(light.position[1]).toBeCloseTo(1, 5);
    expect(light.position[2]).toBeCloseTo(-2, 5);
  });

  it("should keep its distance from the axis while orbiting", () => {
    const light = new PointLight(vec3.create(3, 0, 4));
    for (let i = 0; i < 10; i++) light.orbit(45, 0.37);
    expect(Math.hypot(light.position[0], light.position[2])).toBeCloseTo(5, 4);
  });

  it("should copy values in and out", () => {
    const light = new PointLight();
    const position = vec3.create(1, 2, 3);
    light.setPosition(position);
    light.setColor(vec3.create(0.5, 0.25, 1));
    position[0] = 9;

    const data = light.toUniformData();
    data.color[0] = 0;

    expect(Array.from(light.position)).toEqual([1, 2, 3]);
    expect(Array.from(light.color)).toEqual([0.5, 0.25, 1]);
  });
});
