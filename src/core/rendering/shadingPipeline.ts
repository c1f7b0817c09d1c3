// src/core/rendering/shadingPipeline.ts
import type {
  CameraUniformData,
  InstanceByKind,
  LightUniformData,
  Mesh,
  PipelineKind,
  ShadingDevice,
  ShadingPassEncoder,
} from "@/core/types/gpu";
import {
  type LightingConfig,
  resolveLightingConfig,
  toShaderConstants,
} from "@/core/config";
import { Camera } from "@/core/camera";
import { PointLight } from "@/core/light";
import {
  createMaterial,
  Material,
  type MaterialTexturesByKind,
} from "@/core/materials/material";
import { verifyShaderContract } from "@/core/shaders/contract";
import { ShaderPreprocessor } from "@/core/shaders/preprocessor";
import { Shader } from "@/core/shaders/shader";
import { getShaderUrl } from "@/core/shaders/sources";
import { createGPUBuffer } from "@/core/utils/webgpu";
import {
  BindGroup,
  CAMERA_UNIFORM_SLOT,
  getBindGroupLayoutDescriptors,
  LIGHT_UNIFORM_SLOT,
} from "./bindings";
import { InstanceBufferManager } from "./instanceBufferManager";
import {
  getLayoutKey,
  getVertexBufferLayouts,
  INSTANCE_BUFFER_SLOT,
  MESH_BUFFER_SLOT,
} from "./layouts";
import { UniformManager } from "./uniformManager";

export interface ShadingPipelineOptions<K extends PipelineKind> {
  kind: K;
  /** Format of the single color target (location 0). */
  colorFormat: GPUTextureFormat;
  /** Depth attachment format; `null` disables depth testing. */
  depthFormat?: GPUTextureFormat | null;
  /** Lighting overrides; only the lit pipeline reads them. */
  lighting?: Partial<LightingConfig>;
  initialInstanceCapacity?: number;
  /** Shares the shader file cache between pipelines. */
  preprocessor?: ShaderPreprocessor;
}

/**
 * Throws if two vertex attributes share a shader location.
 */
export const assertUniqueLocations = (
  layouts: GPUVertexBufferLayout[],
): void => {
  const seen = new Set<number>();
  layouts.forEach((layout, bufferIdx) => {
    for (const attr of layout.attributes) {
      if (seen.has(attr.shaderLocation)) {
        throw new Error(
          `Duplicate shader location ${attr.shaderLocation} in buffer ${bufferIdx}`,
        );
      }
      seen.add(attr.shaderLocation);
    }
  });
};

/**
 * One of the two shading pipelines together with the frame-level resources
 * it reads: the camera group, the light group (lit only) and the instance
 * stream.
 *
 * @remarks
 * Construction is where every layout contract is enforced. The shader is
 * checked against the binding and vertex layouts before it is compiled, so a
 * mismatch fails here instead of at draw time. Between draws the caller may
 * update the camera, light and instances; nothing is written during a draw.
 */
export class ShadingPipeline<K extends PipelineKind = PipelineKind> {
  public readonly kind: K;
  public readonly lighting: LightingConfig;
  public readonly shader: Shader;
  /** Indexed by group number. */
  public readonly bindGroupLayouts: GPUBindGroupLayout[];
  public readonly pipelineLayout: GPUPipelineLayout;
  public readonly cameraBuffer: GPUBuffer;
  public readonly cameraBindGroup: GPUBindGroup;
  public readonly lightBuffer: GPUBuffer | null;
  public readonly lightBindGroup: GPUBindGroup | null;
  public readonly instances: InstanceBufferManager<K>;

  private readonly device: ShadingDevice;
  private readonly colorFormat: GPUTextureFormat;
  private readonly depthFormat: GPUTextureFormat | null;
  private readonly uniforms = new UniformManager();
  /** A cache for pipelines, keyed by vertex layouts and target formats. */
  private readonly pipelineCache = new Map<string, GPURenderPipeline>();

  private constructor(
    device: ShadingDevice,
    shader: Shader,
    options: ShadingPipelineOptions<K>,
  ) {
    const { kind } = options;
    this.device = device;
    this.kind = kind;
    this.shader = shader;
    this.lighting = resolveLightingConfig(options.lighting);
    this.colorFormat = options.colorFormat;
    this.depthFormat =
      options.depthFormat === undefined ? "depth24plus" : options.depthFormat;

    this.bindGroupLayouts = getBindGroupLayoutDescriptors(kind).map(
      (descriptor) => device.createBindGroupLayout(descriptor),
    );
    this.pipelineLayout = device.createPipelineLayout({
      label: `${kind.toUpperCase()}_PIPELINE_LAYOUT`,
      // @group(0) material, @group(1) camera, @group(2) light
      bindGroupLayouts: this.bindGroupLayouts,
    });

    this.cameraBuffer = createGPUBuffer(
      device,
      this.uniforms.packCamera(new Camera().toUniformData()),
      GPUBufferUsage.UNIFORM,
      "CAMERA_UNIFORM_BUFFER",
    );
    this.cameraBindGroup = device.createBindGroup({
      label: "CAMERA_BIND_GROUP",
      layout: this.bindGroupLayouts[BindGroup.CAMERA],
      entries: [
        { binding: CAMERA_UNIFORM_SLOT, resource: { buffer: this.cameraBuffer } },
      ],
    });

    if (kind === "lit") {
      const lightBuffer = createGPUBuffer(
        device,
        this.uniforms.packLight(new PointLight().toUniformData()),
        GPUBufferUsage.UNIFORM,
        "LIGHT_UNIFORM_BUFFER",
      );
      this.lightBuffer = lightBuffer;
      this.lightBindGroup = device.createBindGroup({
        label: "LIGHT_BIND_GROUP",
        layout: this.bindGroupLayouts[BindGroup.LIGHT],
        entries: [
          { binding: LIGHT_UNIFORM_SLOT, resource: { buffer: lightBuffer } },
        ],
      });
    } else {
      this.lightBuffer = null;
      this.lightBindGroup = null;
    }

    this.instances = new InstanceBufferManager(
      device,
      kind,
      options.initialInstanceCapacity,
    );

    // Build the default pipeline eagerly so creation errors surface here.
    this.getRenderPipeline();
  }

  /**
   * Loads, verifies and compiles the shader of a pipeline kind and sets up
   * its frame-level resources.
   *
   * @param device The GPU device.
   * @param options Pipeline kind, target formats and lighting overrides.
   * @throws If the shader cannot be read, its bindings or vertex inputs
   *   differ from the layout contract, or the lighting config is invalid.
   */
  public static async create<K extends PipelineKind>(
    device: ShadingDevice,
    options: ShadingPipelineOptions<K>,
  ): Promise<ShadingPipeline<K>> {
    const preprocessor = options.preprocessor ?? new ShaderPreprocessor();
    const shader = await Shader.fromFile(
      device,
      preprocessor,
      getShaderUrl(options.kind),
      `${options.kind.toUpperCase()}_SHADER`,
      (code) => verifyShaderContract(code, options.kind),
    );
    return new ShadingPipeline(device, shader, options);
  }

  /** The material bind group layout (group 0). */
  public get materialBindGroupLayout(): GPUBindGroupLayout {
    return this.bindGroupLayouts[BindGroup.MATERIAL];
  }

  /**
   * Retrieves or creates a render pipeline for the given target formats.
   *
   * @param colorFormat The format of the color target; defaults to the one
   *   given at creation.
   * @param depthFormat The format of the depth attachment; defaults to the
   *   one given at creation.
   */
  public getRenderPipeline(
    colorFormat: GPUTextureFormat = this.colorFormat,
    depthFormat: GPUTextureFormat | null = this.depthFormat,
  ): GPURenderPipeline {
    const vertexBuffers = getVertexBufferLayouts(this.kind);
    const layoutKey = `${getLayoutKey(vertexBuffers)}|${colorFormat}|${depthFormat ?? "none"}`;
    const cached = this.pipelineCache.get(layoutKey);
    if (cached) return cached;

    assertUniqueLocations(vertexBuffers);

    console.log(
      `[ShadingPipeline ${this.kind}] Creating pipeline for ${colorFormat}/${depthFormat ?? "no depth"}`,
    );

    const pipeline = this.device.createRenderPipeline({
      label: `${this.kind.toUpperCase()}_RENDER_PIPELINE`,
      layout: this.pipelineLayout,
      vertex: {
        module: this.shader.module,
        entryPoint: this.shader.vertexEntryPoint,
        buffers: vertexBuffers,
      },
      fragment: {
        module: this.shader.module,
        entryPoint: this.shader.fragmentEntryPoint,
        targets: [{ format: colorFormat }],
        constants:
          this.kind === "lit" ? toShaderConstants(this.lighting) : undefined,
      },
      primitive: {
        topology: "triangle-list",
        frontFace: "ccw",
        cullMode: "back",
      },
      depthStencil: depthFormat
        ? { format: depthFormat, depthWriteEnabled: true, depthCompare: "less" }
        : undefined,
    });
    this.pipelineCache.set(layoutKey, pipeline);
    return pipeline;
  }

  /**
   * Creates a material bound against this pipeline's material layout.
   */
  public createMaterial(textures: MaterialTexturesByKind[K]): Material {
    return createMaterial(
      this.device,
      this.kind,
      this.materialBindGroupLayout,
      textures,
    );
  }

  /**
   * Writes the camera uniform. Call once per frame, between draws.
   */
  public updateCamera(camera: Camera | CameraUniformData): void {
    const data = camera instanceof Camera ? camera.toUniformData() : camera;
    this.uniforms.updateCameraUniform(this.device, this.cameraBuffer, data);
  }

  /**
   * Writes the light uniform.
   *
   * @throws If this is the basic pipeline, which has no light group.
   */
  public updateLight(light: PointLight | LightUniformData): void {
    if (!this.lightBuffer) {
      throw new Error(
        `The ${this.kind} pipeline has no light group (@group(${BindGroup.LIGHT}))`,
      );
    }
    const data = light instanceof PointLight ? light.toUniformData() : light;
    this.uniforms.updateLightUniform(this.device, this.lightBuffer, data);
  }

  /**
   * Packs and uploads the instance stream for the frame.
   *
   * @returns The number of instances uploaded.
   */
  public uploadInstances(instances: readonly InstanceByKind[K][]): number {
    return this.instances.packAndUpload(instances);
  }

  /**
   * Records one instanced draw of a mesh.
   *
   * @param pass The render pass to record into.
   * @param material A material created for this pipeline kind.
   * @param mesh Geometry laid out for this pipeline kind.
   * @param instanceCount Number of instances to draw.
   * @param firstInstance Index of the first instance in the uploaded stream.
   * @throws If the material or mesh was built for the other pipeline kind,
   *   an indexed mesh has no index count, or the instance range runs past
   *   the last upload.
   */
  public draw(
    pass: ShadingPassEncoder,
    material: Material,
    mesh: Mesh,
    instanceCount: number,
    firstInstance = 0,
  ): void {
    if (material.kind !== this.kind) {
      throw new Error(
        `Material ${material.id} was built for the ${material.kind} pipeline, not ${this.kind}`,
      );
    }
    if (mesh.kind !== this.kind) {
      throw new Error(
        `Mesh was laid out for the ${mesh.kind} pipeline, not ${this.kind}`,
      );
    }

    let indexCount = 0;
    if (mesh.indexBuffer) {
      if (mesh.indexCount === undefined) {
        throw new Error("Mesh has an index buffer but no index count");
      }
      indexCount = mesh.indexCount;
    }
    const uploaded = this.instances.count;
    if (firstInstance + instanceCount > uploaded) {
      throw new Error(
        `Draw of instances ${firstInstance}..${firstInstance + instanceCount - 1} exceeds the ${uploaded} uploaded for the ${this.kind} pipeline`,
      );
    }

    pass.setPipeline(this.getRenderPipeline());
    pass.setBindGroup(BindGroup.MATERIAL, material.bindGroup);
    pass.setBindGroup(BindGroup.CAMERA, this.cameraBindGroup);
    if (this.lightBindGroup) {
      pass.setBindGroup(BindGroup.LIGHT, this.lightBindGroup);
    }

    pass.setVertexBuffer(MESH_BUFFER_SLOT, mesh.vertexBuffer);
    pass.setVertexBuffer(
      INSTANCE_BUFFER_SLOT,
      this.instances.getBuffer(),
      firstInstance * this.instances.byteStride,
    );

    if (mesh.indexBuffer) {
      pass.setIndexBuffer(mesh.indexBuffer, mesh.indexFormat ?? "uint32");
      pass.drawIndexed(indexCount, instanceCount);
    } else {
      pass.draw(mesh.vertexCount, instanceCount);
    }
  }
}
