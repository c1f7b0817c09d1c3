// src/core/shaders/shader.ts
import { ShaderPreprocessor } from "./preprocessor";

export class Shader {
  public readonly module: GPUShaderModule;
  /** The flattened WGSL the module was compiled from. */
  public readonly code: string;
  public readonly vertexEntryPoint: string;
  public readonly fragmentEntryPoint: string;

  constructor(
    device: Pick<GPUDevice, "createShaderModule">,
    code: string,
    label?: string,
    vertexEntryPoint = "vs_main",
    fragmentEntryPoint = "fs_main",
  ) {
    this.module = device.createShaderModule({ label, code });
    this.code = code;
    this.vertexEntryPoint = vertexEntryPoint;
    this.fragmentEntryPoint = fragmentEntryPoint;
  }

  /**
   * Loads a shader file, resolves its includes and compiles it.
   *
   * @param device The device to compile on.
   * @param preprocessor The include resolver; shares its file cache.
   * @param fileUrl The main shader file.
   * @param label Debug label of the module.
   * @param check Runs on the flattened source before compilation; throw to
   *   reject it.
   */
  public static async fromFile(
    device: Pick<GPUDevice, "createShaderModule">,
    preprocessor: ShaderPreprocessor,
    fileUrl: URL,
    label?: string,
    check?: (code: string) => void,
  ): Promise<Shader> {
    const processedCode = await preprocessor.process(fileUrl);
    check?.(processedCode);
    return new Shader(device, processedCode, label);
  }
}
