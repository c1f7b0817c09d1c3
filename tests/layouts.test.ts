// tests/layouts.test.ts
import { describe, expect, it } from "vitest";
import {
  getAttributeLocations,
  getInstanceLayout,
  getLayoutKey,
  getMeshVertexLayout,
  getVertexBufferLayouts,
  vertexStrideInFloats,
} from "@/core/rendering/layouts";

const describeAttributes = (layout: GPUVertexBufferLayout) =>
  Array.from(layout.attributes).map(
    (a) => `${a.shaderLocation}@${a.offset}:${a.format}`,
  );

describe("vertex buffer layouts", () => {
  it("should interleave position and texture coordinates for basic meshes", () => {
    const layout = getMeshVertexLayout("basic");
    expect(layout.arrayStride).toBe(20);
    expect(layout.stepMode).toBe("vertex");
    expect(describeAttributes(layout)).toEqual([
      "0@0:float32x3",
      "1@12:float32x2",
    ]);
  });

  it("should add the tangent frame for lit meshes", () => {
    const layout = getMeshVertexLayout("lit");
    expect(layout.arrayStride).toBe(56);
    expect(describeAttributes(layout)).toEqual([
      "0@0:float32x3",
      "1@12:float32x2",
      "2@20:float32x3",
      "3@32:float32x3",
      "4@44:float32x3",
    ]);
    expect(vertexStrideInFloats("lit")).toBe(14);
  });

  it("should step the instance stream per instance", () => {
    const basic = getInstanceLayout("basic");
    expect(basic.stepMode).toBe("instance");
    expect(basic.arrayStride).toBe(64);
    expect(describeAttributes(basic)).toEqual([
      "5@0:float32x4",
      "6@16:float32x4",
      "7@32:float32x4",
      "8@48:float32x4",
    ]);
  });

  it("should append three packed normal matrix lanes for lit instances", () => {
    const lit = getInstanceLayout("lit");
    expect(lit.arrayStride).toBe(100);
    expect(describeAttributes(lit).slice(4)).toEqual([
      "9@64:float32x3",
      "10@76:float32x3",
      "11@88:float32x3",
    ]);
  });

  it("should list locations without gaps or repeats", () => {
    expect(getAttributeLocations("basic")).toEqual([0, 1, 5, 6, 7, 8]);
    expect(getAttributeLocations("lit")).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
    ]);
  });

  it("should order buffers mesh first, instances second", () => {
    const [mesh, instances] = getVertexBufferLayouts("lit");
    expect(mesh.stepMode).toBe("vertex");
    expect(instances.stepMode).toBe("instance");
  });

  it("should produce stable and distinct layout keys", () => {
    const basicKey = getLayoutKey(getVertexBufferLayouts("basic"));
    expect(getLayoutKey(getVertexBufferLayouts("basic"))).toBe(basicKey);
    expect(getLayoutKey(getVertexBufferLayouts("lit"))).not.toBe(basicKey);
    expect(basicKey).toBe(
      "20:vertex:0:float32x3:0,1:float32x2:12|64:instance:5:float32x4:0,6:float32x4:16,7:float32x4:32,8:float32x4:48",
    );
  });
});
