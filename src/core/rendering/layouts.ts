// src/core/rendering/layouts.ts
import type { PipelineKind } from "@/core/types/gpu";
import { instanceStrideInFloats } from "./reference/attributeAssembler";

/** Vertex buffer slot the interleaved mesh data is bound to. */
export const MESH_BUFFER_SLOT = 0;
/** Vertex buffer slot the per-instance stream is bound to. */
export const INSTANCE_BUFFER_SLOT = 1;

/**
 * Shader locations of every vertex and instance attribute. These numbers are
 * part of the contract with the WGSL `VertexInput` / `InstanceInput` structs.
 */
export const AttributeLocation = {
  POSITION: 0,
  TEX_COORDS: 1,
  NORMAL: 2,
  TANGENT: 3,
  BITANGENT: 4,
  MODEL_MATRIX_0: 5,
  MODEL_MATRIX_1: 6,
  MODEL_MATRIX_2: 7,
  MODEL_MATRIX_3: 8,
  NORMAL_MATRIX_0: 9,
  NORMAL_MATRIX_1: 10,
  NORMAL_MATRIX_2: 11,
} as const;

/** Floats per interleaved mesh vertex. */
export const vertexStrideInFloats = (kind: PipelineKind): number =>
  kind === "lit" ? 3 + 2 + 3 + 3 + 3 : 3 + 2;

/**
 * Returns the layout of the interleaved mesh vertex buffer.
 *
 * @remarks
 * | Offset (bytes) | Attribute   | Format      | Location | Kind  |
 * |:---------------|:------------|:------------|:---------|:------|
 * | 0              | `position`  | `float32x3` | 0        | both  |
 * | 12             | `texCoords` | `float32x2` | 1        | both  |
 * | 20             | `normal`    | `float32x3` | 2        | lit   |
 * | 32             | `tangent`   | `float32x3` | 3        | lit   |
 * | 44             | `bitangent` | `float32x3` | 4        | lit   |
 */
export const getMeshVertexLayout = (
  kind: PipelineKind,
): GPUVertexBufferLayout => {
  const attributes: GPUVertexAttribute[] = [
    {
      shaderLocation: AttributeLocation.POSITION,
      offset: 0,
      format: "float32x3",
    },
    {
      shaderLocation: AttributeLocation.TEX_COORDS,
      offset: 12,
      format: "float32x2",
    },
  ];

  if (kind === "lit") {
    attributes.push(
      { shaderLocation: AttributeLocation.NORMAL, offset: 20, format: "float32x3" },
      { shaderLocation: AttributeLocation.TANGENT, offset: 32, format: "float32x3" },
      {
        shaderLocation: AttributeLocation.BITANGENT,
        offset: 44,
        format: "float32x3",
      },
    );
  }

  return {
    arrayStride: vertexStrideInFloats(kind) * Float32Array.BYTES_PER_ELEMENT,
    stepMode: "vertex",
    attributes,
  };
};

/**
 * Returns the layout of the per-instance stream.
 *
 * @remarks
 * The model matrix arrives as four `float32x4` columns and the normal matrix
 * (lit only) as three tightly packed `float32x3` columns; the shaders rebuild
 * the matrices from these lanes.
 */
export const getInstanceLayout = (
  kind: PipelineKind,
): GPUVertexBufferLayout => {
  const attributes: GPUVertexAttribute[] = [
    { shaderLocation: AttributeLocation.MODEL_MATRIX_0, offset: 0, format: "float32x4" },
    { shaderLocation: AttributeLocation.MODEL_MATRIX_1, offset: 16, format: "float32x4" },
    { shaderLocation: AttributeLocation.MODEL_MATRIX_2, offset: 32, format: "float32x4" },
    { shaderLocation: AttributeLocation.MODEL_MATRIX_3, offset: 48, format: "float32x4" },
  ];

  if (kind === "lit") {
    attributes.push(
      { shaderLocation: AttributeLocation.NORMAL_MATRIX_0, offset: 64, format: "float32x3" },
      { shaderLocation: AttributeLocation.NORMAL_MATRIX_1, offset: 76, format: "float32x3" },
      { shaderLocation: AttributeLocation.NORMAL_MATRIX_2, offset: 88, format: "float32x3" },
    );
  }

  return {
    arrayStride: instanceStrideInFloats(kind) * Float32Array.BYTES_PER_ELEMENT,
    stepMode: "instance",
    attributes,
  };
};

/**
 * All vertex buffer layouts of a pipeline, in slot order.
 */
export const getVertexBufferLayouts = (
  kind: PipelineKind,
): GPUVertexBufferLayout[] => [
  getMeshVertexLayout(kind),
  getInstanceLayout(kind),
];

/**
 * Generates a stable, unique string key from an array of GPUVertexBufferLayout objects.
 * This is used for caching pipelines, as object references cannot be reliably
 * used as map keys when layouts are created dynamically.
 *
 * @param layouts - The array of vertex buffer layouts to serialize.
 * @returns A unique string representation of the layouts.
 */
export const getLayoutKey = (layouts: GPUVertexBufferLayout[]): string =>
  layouts
    .map((layout) => {
      const attributes = Array.from(layout.attributes)
        .map((attr) => `${attr.shaderLocation}:${attr.format}:${attr.offset}`)
        .join(",");
      return `${layout.arrayStride}:${layout.stepMode ?? "vertex"}:${attributes}`;
    })
    .join("|");

/**
 * Lists every shader location consumed by a pipeline, in ascending order.
 */
export const getAttributeLocations = (kind: PipelineKind): number[] =>
  getVertexBufferLayouts(kind)
    .flatMap((layout) => Array.from(layout.attributes))
    .map((attr) => attr.shaderLocation)
    .sort((a, b) => a - b);
