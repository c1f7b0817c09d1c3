// src/core/rendering/instanceBufferManager.ts
import type {
  InstanceByKind,
  PipelineKind,
  ShadingDevice,
} from "@/core/types/gpu";
import {
  instanceStrideInFloats,
  packInstance,
} from "./reference/attributeAssembler";

/**
 * Manages the allocation, packing, and uploading of per-instance data to a
 * single GPU buffer for one pipeline kind.
 *
 * Instances are flattened into the exact lane order the vertex stage reads
 * back (see `getInstanceLayout`), then uploaded with a single write per frame.
 */
export class InstanceBufferManager<K extends PipelineKind> {
  public readonly kind: K;
  private readonly device: ShadingDevice;
  private readonly strideInFloats: number;
  private buffer: GPUBuffer | null = null;
  private cpuBuffer = new Float32Array(0);
  private capacityInInstances = 0; // Current capacity of the buffers
  private uploadedCount = 0;

  constructor(device: ShadingDevice, kind: K, initialCapacity = 1024) {
    this.device = device;
    this.kind = kind;
    this.strideInFloats = instanceStrideInFloats(kind);
    this.ensureCapacity(initialCapacity);
  }

  /** Size of one instance in bytes. */
  public get byteStride(): number {
    return this.strideInFloats * Float32Array.BYTES_PER_ELEMENT;
  }

  public get capacity(): number {
    return this.capacityInInstances;
  }

  /** Number of instances in the last upload. */
  public get count(): number {
    return this.uploadedCount;
  }

  /**
   * Returns the underlying GPU buffer.
   */
  public getBuffer(): GPUBuffer {
    if (!this.buffer) {
      throw new Error("Instance buffer has not been allocated");
    }
    return this.buffer;
  }

  /**
   * Returns the CPU-side staging array as last packed.
   */
  public getStagingData(): Float32Array {
    return this.cpuBuffer;
  }

  /**
   * Ensures the CPU and GPU buffers are large enough for the required number of instances.
   * Recreates buffers if the required capacity exceeds the current capacity.
   * @param requiredInstances The total number of instances needed for the frame.
   */
  private ensureCapacity(requiredInstances: number): void {
    if (this.buffer && requiredInstances <= this.capacityInInstances) {
      return;
    }

    if (this.buffer) {
      this.buffer.destroy();
    }

    // Grow capacity with a 1.5x factor to reduce frequent reallocations
    const previousCapacity = this.capacityInInstances;
    this.capacityInInstances = Math.max(
      1,
      Math.ceil(Math.max(requiredInstances, this.capacityInInstances) * 1.5),
    );
    if (previousCapacity > 0) {
      console.log(
        `[InstanceBufferManager ${this.kind}] Growing from ${previousCapacity} to ${this.capacityInInstances} instances`,
      );
    }

    this.buffer = this.device.createBuffer({
      label: `${this.kind.toUpperCase()}_INSTANCE_DATA_BUFFER`,
      size: this.capacityInInstances * this.byteStride,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });

    this.cpuBuffer = new Float32Array(
      this.capacityInInstances * this.strideInFloats,
    );
  }

  /**
   * Packs all instances for the frame into the CPU-side buffer and then
   * uploads them to the GPU in one operation.
   *
   * @param instances The instances to draw, in draw order.
   * @returns The number of instances uploaded.
   */
  public packAndUpload(instances: readonly InstanceByKind[K][]): number {
    this.ensureCapacity(instances.length);

    for (let i = 0; i < instances.length; i++) {
      packInstance(
        this.kind,
        instances[i],
        this.cpuBuffer,
        i * this.strideInFloats,
      );
    }

    // Perform a single upload to the GPU
    if (instances.length > 0) {
      this.device.queue.writeBuffer(
        this.getBuffer(),
        0,
        this.cpuBuffer.buffer,
        0,
        instances.length * this.byteStride,
      );
    }

    this.uploadedCount = instances.length;
    return instances.length;
  }
}
