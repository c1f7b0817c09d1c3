// src/core/materials/material.ts
import type {
  MaterialTexture,
  PipelineKind,
  ShadingDevice,
} from "@/core/types/gpu";
import { MaterialSlot } from "@/core/rendering/bindings";

export interface BasicMaterialTextures {
  diffuse: MaterialTexture;
}

export interface LitMaterialTextures extends BasicMaterialTextures {
  /** Tangent-space normal map, channels encoded as (n + 1) / 2. */
  normal: MaterialTexture;
}

export interface MaterialTexturesByKind {
  basic: BasicMaterialTextures;
  lit: LitMaterialTextures;
}

/**
 * The material group (group 0) of one draw batch: the bind group holding
 * its textures and samplers, tagged with the pipeline kind it was built for.
 */
export class Material {
  private static nextId = 0;
  public readonly id: number;
  public readonly kind: PipelineKind;
  /** The bind group containing resources specific to this material (textures, samplers). */
  public readonly bindGroup: GPUBindGroup;

  constructor(kind: PipelineKind, bindGroup: GPUBindGroup) {
    this.id = Material.nextId++;
    this.kind = kind;
    this.bindGroup = bindGroup;
  }
}

/**
 * Lists the material group entries for a set of textures, in slot order.
 *
 * @throws If a lit material is given no normal map.
 */
export const getMaterialBindGroupEntries = (
  kind: PipelineKind,
  textures: BasicMaterialTextures | LitMaterialTextures,
): GPUBindGroupEntry[] => {
  const entries: GPUBindGroupEntry[] = [
    {
      binding: MaterialSlot.DIFFUSE_TEXTURE,
      resource: textures.diffuse.view,
    },
    {
      binding: MaterialSlot.DIFFUSE_SAMPLER,
      resource: textures.diffuse.sampler,
    },
  ];

  if (kind === "basic") return entries;

  if (!("normal" in textures)) {
    throw new Error(
      `Lit material needs a normal map at @group(0) @binding(${MaterialSlot.NORMAL_TEXTURE})`,
    );
  }
  entries.push(
    { binding: MaterialSlot.NORMAL_TEXTURE, resource: textures.normal.view },
    { binding: MaterialSlot.NORMAL_SAMPLER, resource: textures.normal.sampler },
  );
  return entries;
};

/**
 * Creates a material for the given pipeline kind.
 *
 * @param device The GPUDevice.
 * @param kind The pipeline kind the material is drawn with.
 * @param layout The material bind group layout of that pipeline.
 * @param textures The textures to bind.
 * @returns A configured Material instance.
 */
export function createMaterial<K extends PipelineKind>(
  device: ShadingDevice,
  kind: K,
  layout: GPUBindGroupLayout,
  textures: MaterialTexturesByKind[K],
): Material;
export function createMaterial(
  device: ShadingDevice,
  kind: PipelineKind,
  layout: GPUBindGroupLayout,
  textures: BasicMaterialTextures | LitMaterialTextures,
): Material {
  const bindGroup = device.createBindGroup({
    label: `${kind.toUpperCase()}_MATERIAL_BIND_GROUP`,
    layout,
    entries: getMaterialBindGroupEntries(kind, textures),
  });
  return new Material(kind, bindGroup);
}
