// tests/bindings.test.ts
import { describe, expect, it } from "vitest";
import {
  BindGroup,
  getBindGroupCount,
  getBindGroupLayoutDescriptors,
  getBindingSlots,
} from "@/core/rendering/bindings";

const slotKeys = (kind: "basic" | "lit") =>
  getBindingSlots(kind).map((s) => `${s.group}/${s.binding}:${s.resource}`);

describe("binding contract", () => {
  it("should declare the diffuse pair and camera for the basic pipeline", () => {
    expect(slotKeys("basic")).toEqual([
      "0/0:texture",
      "0/1:sampler",
      "1/0:uniform",
    ]);
    expect(getBindGroupCount("basic")).toBe(2);
  });

  it("should add the normal pair and light group for the lit pipeline", () => {
    expect(slotKeys("lit")).toEqual([
      "0/0:texture",
      "0/1:sampler",
      "0/2:texture",
      "0/3:sampler",
      "1/0:uniform",
      "2/0:uniform",
    ]);
    expect(getBindGroupCount("lit")).toBe(3);
  });

  it("should keep the camera at the same group and slot in both pipelines", () => {
    const camera = (kind: "basic" | "lit") =>
      getBindingSlots(kind).find((s) => s.label === "camera uniform");
    expect(camera("basic")).toEqual(camera("lit"));
    expect(camera("lit")?.group).toBe(BindGroup.CAMERA);
  });

  describe("layout descriptors", () => {
    it("should build one descriptor per group", () => {
      const descriptors = getBindGroupLayoutDescriptors("lit");
      expect(descriptors.map((d) => d.label)).toEqual([
        "LIT_MATERIAL_BIND_GROUP_LAYOUT",
        "LIT_CAMERA_BIND_GROUP_LAYOUT",
        "LIT_LIGHT_BIND_GROUP_LAYOUT",
      ]);
      expect(getBindGroupLayoutDescriptors("basic")).toHaveLength(2);
    });

    it("should expose textures and samplers to the fragment stage only", () => {
      const [material] = getBindGroupLayoutDescriptors("lit");
      const entries = Array.from(material.entries);
      expect(entries.map((e) => e.visibility)).toEqual([
        GPUShaderStage.FRAGMENT,
        GPUShaderStage.FRAGMENT,
        GPUShaderStage.FRAGMENT,
        GPUShaderStage.FRAGMENT,
      ]);
      expect(entries[0].texture).toEqual({
        sampleType: "float",
        viewDimension: "2d",
      });
      expect(entries[3].sampler).toEqual({ type: "filtering" });
    });

    it("should expose uniforms to both stages", () => {
      const [, camera, light] = getBindGroupLayoutDescriptors("lit");
      for (const descriptor of [camera, light]) {
        const [entry] = Array.from(descriptor.entries);
        expect(entry.binding).toBe(0);
        expect(entry.visibility).toBe(
          GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
        );
        expect(entry.buffer).toEqual({ type: "uniform" });
      }
    });
  });
});
