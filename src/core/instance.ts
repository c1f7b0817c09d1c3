// src/core/instance.ts
import { mat4, type Mat4, quat, type Quat, vec3, type Vec3 } from "wgpu-matrix";
import type { LitInstance } from "@/core/types/gpu";
import { computeNormalMatrix } from "@/core/rendering/reference/attributeAssembler";

/**
 * Placement of one drawn copy of a mesh.
 */
export class Instance {
  public position: Vec3;
  public rotation: Quat;
  public scale: Vec3;

  constructor(
    position: Vec3 = vec3.create(0, 0, 0),
    rotation: Quat = quat.identity(),
    scale: Vec3 = vec3.create(1, 1, 1),
  ) {
    this.position = vec3.clone(position);
    this.rotation = quat.clone(rotation);
    this.scale = vec3.clone(scale);
  }

  /** Object to world transform, T * R * S. */
  public get modelMatrix(): Mat4 {
    const model = mat4.translation(this.position);
    mat4.multiply(model, mat4.fromQuat(this.rotation), model);
    return mat4.scale(model, this.scale, model);
  }

  /**
   * Model and normal matrices, consistent with each other. Usable by both
   * pipeline kinds; the basic one ignores the normal matrix.
   */
  public toInstanceData(): LitInstance {
    const modelMatrix = this.modelMatrix;
    return { modelMatrix, normalMatrix: computeNormalMatrix(modelMatrix) };
  }
}

/**
 * Lays out `perRow * perRow` instances on a square grid in the XZ plane,
 * centred on the origin.
 *
 * @remarks
 * Each instance is rotated 45 degrees about its own normalized position;
 * an instance sitting exactly at the origin keeps the identity rotation.
 *
 * @param perRow Instances along each side.
 * @param spacing Distance between neighbouring instances.
 */
export const createInstanceGrid = (
  perRow: number,
  spacing: number,
): Instance[] => {
  const instances: Instance[] = [];
  for (let z = 0; z < perRow; z++) {
    for (let x = 0; x < perRow; x++) {
      const position = vec3.create(
        spacing * (x - perRow / 2),
        0,
        spacing * (z - perRow / 2),
      );
      const rotation =
        vec3.lengthSq(position) === 0
          ? quat.identity()
          : quat.fromAxisAngle(vec3.normalize(position), Math.PI / 4);
      instances.push(new Instance(position, rotation));
    }
  }
  return instances;
};
