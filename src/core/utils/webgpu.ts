// src/core/utils/webgpu.ts
import type { ShadingDevice, TypedArray } from "@/core/types/gpu";

/**
 * Creates and populates a GPUBuffer from a TypedArray.
 *
 * @param device - The GPU device used to create the buffer.
 * @param data - The typed array of data to be copied into the buffer.
 * @param usage - The intended usage for the buffer, specified
 *   using GPUBufferUsage flags (GPUBufferUsage.VERTEX, GPUBufferUsage.COPY_DST etc).
 * @returns The created and populated GPU buffer, now owned by the GPU.
 */
export const createGPUBuffer = (
  device: ShadingDevice,
  data: TypedArray,
  usage: GPUBufferUsageFlags,
  label?: string,
): GPUBuffer => {
  // Pad the buffer size to a multiple of 4 bytes.
  const paddedSize = Math.max(4, Math.ceil(data.byteLength / 4) * 4);

  const gpuBuffer = device.createBuffer({
    label,
    size: paddedSize,
    usage: usage | GPUBufferUsage.COPY_DST, // ensure we can upload with writeBuffer
    mappedAtCreation: false,
  });

  // writeBuffer sizes must be a multiple of 4, so odd-sized data goes through
  // a zero-filled copy of the padded size.
  if (paddedSize === data.byteLength) {
    device.queue.writeBuffer(
      gpuBuffer,
      0,
      data.buffer,
      data.byteOffset,
      data.byteLength,
    );
  } else {
    const padded = new Uint8Array(paddedSize);
    padded.set(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    device.queue.writeBuffer(gpuBuffer, 0, padded.buffer, 0, paddedSize);
  }

  return gpuBuffer;
};
