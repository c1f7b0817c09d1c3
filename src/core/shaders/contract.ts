// src/core/shaders/contract.ts
import type { PipelineKind } from "@/core/types/gpu";
import {
  type BindingResourceKind,
  getBindingSlots,
} from "@/core/rendering/bindings";
import { getAttributeLocations } from "@/core/rendering/layouts";

/** A `@group(g) @binding(b) var ...` declaration found in WGSL source. */
export interface DeclaredBinding {
  group: number;
  binding: number;
  name: string;
  resource: BindingResourceKind | "unknown";
}

const BINDING_REGEX =
  /@group\((\d+)\)\s*@binding\((\d+)\)\s*var(?:<([^>]+)>)?\s+(\w+)\s*:\s*([\w<>]+)/g;
const INPUT_STRUCT_REGEX = /struct\s+(VertexInput|InstanceInput)\s*\{([^}]*)\}/g;
const LOCATION_REGEX = /@location\((\d+)\)/g;

const classify = (
  addressSpace: string | undefined,
  type: string,
): DeclaredBinding["resource"] => {
  if (addressSpace === "uniform") return "uniform";
  if (type.startsWith("texture_")) return "texture";
  if (type === "sampler") return "sampler";
  return "unknown";
};

/**
 * Extracts every resource binding declared in a WGSL module.
 */
export const parseDeclaredBindings = (code: string): DeclaredBinding[] =>
  Array.from(code.matchAll(BINDING_REGEX), (match) => ({
    group: Number(match[1]),
    binding: Number(match[2]),
    name: match[4],
    resource: classify(match[3], match[5]),
  }));

/**
 * Extracts the `@location` numbers of the `VertexInput` and `InstanceInput`
 * structs, in ascending order.
 */
export const parseDeclaredInputLocations = (code: string): number[] => {
  const locations: number[] = [];
  for (const struct of code.matchAll(INPUT_STRUCT_REGEX)) {
    for (const location of struct[2].matchAll(LOCATION_REGEX)) {
      locations.push(Number(location[1]));
    }
  }
  return locations.sort((a, b) => a - b);
};

/**
 * Checks that a flattened shader declares exactly the bindings and vertex
 * input locations of a pipeline kind.
 *
 * @param code The WGSL source with includes resolved.
 * @param kind The pipeline kind the shader is used for.
 * @throws If a slot is missing, extra, duplicated or holds the wrong kind of
 *   resource, or if the input locations differ from the buffer layouts.
 */
export const verifyShaderContract = (code: string, kind: PipelineKind): void => {
  const declared = parseDeclaredBindings(code);
  const expected = getBindingSlots(kind);
  const slotKey = (group: number, binding: number) => `${group}:${binding}`;

  const declaredByKey = new Map<string, DeclaredBinding>();
  for (const binding of declared) {
    const key = slotKey(binding.group, binding.binding);
    if (declaredByKey.has(key)) {
      throw new Error(
        `Shader for '${kind}' declares @group(${binding.group}) @binding(${binding.binding}) more than once`,
      );
    }
    declaredByKey.set(key, binding);
  }

  for (const slot of expected) {
    const key = slotKey(slot.group, slot.binding);
    const binding = declaredByKey.get(key);
    if (!binding) {
      throw new Error(
        `Shader for '${kind}' is missing the ${slot.label} at @group(${slot.group}) @binding(${slot.binding})`,
      );
    }
    if (binding.resource !== slot.resource) {
      throw new Error(
        `Shader for '${kind}' binds '${binding.name}' at @group(${slot.group}) @binding(${slot.binding}) as ${binding.resource}, expected ${slot.resource}`,
      );
    }
    declaredByKey.delete(key);
  }

  const [extra] = declaredByKey.values();
  if (extra) {
    throw new Error(
      `Shader for '${kind}' declares '${extra.name}' at @group(${extra.group}) @binding(${extra.binding}), which is not part of the binding layout`,
    );
  }

  const locations = parseDeclaredInputLocations(code);
  const expectedLocations = getAttributeLocations(kind);
  if (locations.join(",") !== expectedLocations.join(",")) {
    throw new Error(
      `Shader for '${kind}' reads vertex inputs at locations [${locations.join(", ")}], expected [${expectedLocations.join(", ")}]`,
    );
  }
};
