// tests/cameraController.test.ts
import { describe, expect, it } from "vitest";
import { vec3 } from "wgpu-matrix";
import { Camera } from "@/core/camera";
import {
  CameraController,
  type CameraMovement,
} from "@/core/cameraController";

const held = (keys: Partial<CameraMovement>): CameraMovement => ({
  forward: false,
  backward: false,
  left: false,
  right: false,
  ...keys,
});

const cameraAt = (z: number) => new Camera({ eye: vec3.create(0, 0, z) });

describe("CameraController", () => {
  it("should default to 30 units per second", () => {
    expect(new CameraController().speed).toBe(30);
  });

  it("should dolly toward the target by speed times elapsed time", () => {
    const camera = cameraAt(10);
    new CameraController(2).update(camera, held({ forward: true }), 0.5);
    expect(camera.eye[0]).toBeCloseTo(0, 6);
    expect(camera.eye[1]).toBeCloseTo(0, 6);
    expect(camera.eye[2]).toBeCloseTo(9, 6);
  });

  it("should not pass through the target", () => {
    const camera = cameraAt(0.5);
    new CameraController(2).update(camera, held({ forward: true }), 0.5);
    expect(Array.from(camera.eye)).toEqual([0, 0, 0.5]);
  });

  it("should dolly away from the target", () => {
    const camera = cameraAt(10);
    new CameraController(2).update(camera, held({ backward: true }), 0.5);
    expect(camera.eye[2]).toBeCloseTo(11, 6);
  });

  it("should orbit to the right at a constant radius", () => {
    const camera = cameraAt(10);
    new CameraController(2).update(camera, held({ right: true }), 0.5);

    expect(camera.eye[0]).toBeCloseTo(10 / Math.sqrt(101), 5);
    expect(camera.eye[1]).toBeCloseTo(0, 6);
    expect(camera.eye[2]).toBeCloseTo(100 / Math.sqrt(101), 5);
    expect(vec3.length(camera.eye)).toBeCloseTo(10, 5);
  });

  it("should orbit to the left at a constant radius", () => {
    const camera = cameraAt(10);
    new CameraController(2).update(camera, held({ left: true }), 0.5);

    expect(camera.eye[0]).toBeCloseTo(-10 / Math.sqrt(101), 5);
    expect(vec3.length(camera.eye)).toBeCloseTo(10, 5);
  });

  it("should orbit at the radius left after dollying", () => {
    const camera = cameraAt(10);
    new CameraController(2).update(
      camera,
      held({ forward: true, right: true }),
      0.5,
    );
    expect(vec3.length(camera.eye)).toBeCloseTo(9, 5);
    expect(camera.eye[0]).toBeGreaterThan(0);
  });

  it("should move the eye in place and leave the target alone", () => {
    const camera = cameraAt(10);
    const eye = camera.eye;
    new CameraController().update(camera, held({ right: true }), 1 / 60);
    expect(camera.eye).toBe(eye);
    expect(Array.from(camera.target)).toEqual([0, 0, 0]);
  });

  it("should not move without held keys or elapsed time", () => {
    const camera = cameraAt(10);
    const controller = new CameraController();
    controller.update(camera, held({}), 1);
    controller.update(camera, held({ forward: true, left: true }), 0);
    expect(camera.eye[0]).toBeCloseTo(0, 6);
    expect(camera.eye[2]).toBeCloseTo(10, 6);
  });
});
