// src/core/shaders/sources.ts
import type { PipelineKind } from "@/core/types/gpu";

const SHADER_FILES: Record<PipelineKind, string> = {
  basic: "./basic.wgsl",
  lit: "./lit.wgsl",
};

/**
 * Location of the main WGSL file of a pipeline kind, next to this module.
 */
export const getShaderUrl = (kind: PipelineKind): URL =>
  new URL(SHADER_FILES[kind], import.meta.url);
