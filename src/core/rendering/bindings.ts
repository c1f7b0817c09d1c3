// src/core/rendering/bindings.ts
import type { PipelineKind } from "@/core/types/gpu";

/**
 * Bind group indices, ordered by how often their resources change:
 * material resources per draw batch, the camera per frame, the light on
 * change.
 */
export const BindGroup = {
  MATERIAL: 0,
  CAMERA: 1,
  LIGHT: 2,
} as const;

/** Slots within the material group. */
export const MaterialSlot = {
  DIFFUSE_TEXTURE: 0,
  DIFFUSE_SAMPLER: 1,
  NORMAL_TEXTURE: 2,
  NORMAL_SAMPLER: 3,
} as const;

/** Slot of the camera uniform within the camera group. */
export const CAMERA_UNIFORM_SLOT = 0;
/** Slot of the light uniform within the light group. */
export const LIGHT_UNIFORM_SLOT = 0;

/** Byte size of the WGSL `Camera` struct. */
export const CAMERA_UNIFORM_BYTE_SIZE = 80;
/** Byte size of the WGSL `Light` struct. */
export const LIGHT_UNIFORM_BYTE_SIZE = 32;

/** What kind of resource a binding slot holds. */
export type BindingResourceKind = "texture" | "sampler" | "uniform";

/** One entry of the binding contract. */
export interface BindingSlot {
  group: number;
  binding: number;
  resource: BindingResourceKind;
  label: string;
}

/**
 * Lists every group/slot a pipeline kind declares, in group then slot order.
 *
 * @remarks
 * | Group | Slot | Resource        | Kind  |
 * |:------|:-----|:----------------|:------|
 * | 0     | 0    | diffuse texture | both  |
 * | 0     | 1    | diffuse sampler | both  |
 * | 0     | 2    | normal texture  | lit   |
 * | 0     | 3    | normal sampler  | lit   |
 * | 1     | 0    | camera uniform  | both  |
 * | 2     | 0    | light uniform   | lit   |
 */
export const getBindingSlots = (kind: PipelineKind): BindingSlot[] => {
  const slots: BindingSlot[] = [
    {
      group: BindGroup.MATERIAL,
      binding: MaterialSlot.DIFFUSE_TEXTURE,
      resource: "texture",
      label: "diffuse texture",
    },
    {
      group: BindGroup.MATERIAL,
      binding: MaterialSlot.DIFFUSE_SAMPLER,
      resource: "sampler",
      label: "diffuse sampler",
    },
  ];

  if (kind === "lit") {
    slots.push(
      {
        group: BindGroup.MATERIAL,
        binding: MaterialSlot.NORMAL_TEXTURE,
        resource: "texture",
        label: "normal texture",
      },
      {
        group: BindGroup.MATERIAL,
        binding: MaterialSlot.NORMAL_SAMPLER,
        resource: "sampler",
        label: "normal sampler",
      },
    );
  }

  slots.push({
    group: BindGroup.CAMERA,
    binding: CAMERA_UNIFORM_SLOT,
    resource: "uniform",
    label: "camera uniform",
  });

  if (kind === "lit") {
    slots.push({
      group: BindGroup.LIGHT,
      binding: LIGHT_UNIFORM_SLOT,
      resource: "uniform",
      label: "light uniform",
    });
  }

  return slots;
};

/** Number of bind groups a pipeline kind uses. */
export const getBindGroupCount = (kind: PipelineKind): number =>
  kind === "lit" ? 3 : 2;

const toLayoutEntry = (slot: BindingSlot): GPUBindGroupLayoutEntry => {
  switch (slot.resource) {
    case "texture":
      return {
        binding: slot.binding,
        visibility: GPUShaderStage.FRAGMENT,
        texture: { sampleType: "float", viewDimension: "2d" },
      };
    case "sampler":
      return {
        binding: slot.binding,
        visibility: GPUShaderStage.FRAGMENT,
        sampler: { type: "filtering" },
      };
    case "uniform":
      return {
        binding: slot.binding,
        visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
        buffer: { type: "uniform" },
      };
  }
};

const GROUP_LABELS = [
  "MATERIAL_BIND_GROUP_LAYOUT",
  "CAMERA_BIND_GROUP_LAYOUT",
  "LIGHT_BIND_GROUP_LAYOUT",
] as const;

/**
 * Builds the bind group layout descriptors of a pipeline kind, indexed by
 * group number.
 */
export const getBindGroupLayoutDescriptors = (
  kind: PipelineKind,
): GPUBindGroupLayoutDescriptor[] => {
  const slots = getBindingSlots(kind);
  const descriptors: GPUBindGroupLayoutDescriptor[] = [];
  for (let group = 0; group < getBindGroupCount(kind); group++) {
    descriptors.push({
      label: `${kind.toUpperCase()}_${GROUP_LABELS[group]}`,
      entries: slots.filter((s) => s.group === group).map(toLayoutEntry),
    });
  }
  return descriptors;
};
