// src/core/resources/meshFactory.ts
import type {
  BasicVertex,
  LitVertex,
  Mesh,
  PipelineKind,
  ShadingDevice,
  VertexByKind,
} from "@/core/types/gpu";
import { vertexStrideInFloats } from "@/core/rendering/layouts";
import { createGPUBuffer } from "@/core/utils/webgpu";

const writeLane = (
  target: Float32Array,
  offset: number,
  source: ArrayLike<number>,
  size: number,
): void => {
  for (let i = 0; i < size; i++) target[offset + i] = source[i];
};

/**
 * Writes vertex records into one interleaved array in the attribute order of
 * the pipeline kind's mesh layout.
 *
 * @throws If a lit vertex lacks any of its tangent frame vectors.
 */
export function interleaveVertices<K extends PipelineKind>(
  kind: K,
  vertices: readonly VertexByKind[K][],
): Float32Array;
export function interleaveVertices(
  kind: PipelineKind,
  vertices: readonly (BasicVertex | LitVertex)[],
): Float32Array {
  const stride = vertexStrideInFloats(kind);
  const data = new Float32Array(vertices.length * stride);

  vertices.forEach((vertex, i) => {
    const offset = i * stride;
    writeLane(data, offset, vertex.position, 3);
    writeLane(data, offset + 3, vertex.texCoords, 2);
    if (kind !== "lit") return;
    if (
      !("normal" in vertex) ||
      !vertex.normal ||
      !vertex.tangent ||
      !vertex.bitangent
    ) {
      throw new Error(
        `[MeshFactory] Lit vertex ${i} is missing its normal, tangent or bitangent`,
      );
    }
    writeLane(data, offset + 5, vertex.normal, 3);
    writeLane(data, offset + 8, vertex.tangent, 3);
    writeLane(data, offset + 11, vertex.bitangent, 3);
  });

  return data;
}

/**
 * Uploads vertex (and optional index) data for one pipeline kind.
 *
 * @param device The GPU device.
 * @param kind The pipeline the mesh will be drawn with.
 * @param vertices The vertex records.
 * @param indices Optional triangle list indices.
 * @param label Debug label prefix for the buffers.
 * @throws If an index points past the last vertex.
 */
export function createMesh<K extends PipelineKind>(
  device: ShadingDevice,
  kind: K,
  vertices: readonly VertexByKind[K][],
  indices?: Uint16Array | Uint32Array,
  label = "MESH",
): Mesh {
  if (indices) {
    for (const index of indices) {
      if (index >= vertices.length) {
        throw new Error(
          `[MeshFactory] Index ${index} out of range for ${vertices.length} vertices in "${label}"`,
        );
      }
    }
  }

  const vertexBuffer = createGPUBuffer(
    device,
    interleaveVertices(kind, vertices),
    GPUBufferUsage.VERTEX,
    `${label}_VERTEX_BUFFER`,
  );

  const mesh: Mesh = { kind, vertexBuffer, vertexCount: vertices.length };
  if (indices) {
    mesh.indexBuffer = createGPUBuffer(
      device,
      indices,
      GPUBufferUsage.INDEX,
      `${label}_INDEX_BUFFER`,
    );
    mesh.indexFormat = indices instanceof Uint16Array ? "uint16" : "uint32";
    mesh.indexCount = indices.length;
  }
  return mesh;
}
