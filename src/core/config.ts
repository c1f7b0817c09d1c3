// src/core/config.ts

/**
 * Tunable constants of the Blinn-Phong lighting model.
 *
 * Both values are hand-tuned rather than physically derived. They reach the
 * lit shader as pipeline-overridable constants, so changing them means
 * creating a new pipeline.
 */
export interface LightingConfig {
  /** Fraction of the light color applied regardless of orientation. */
  ambientStrength: number;
  /** Specular exponent; larger values give a tighter highlight. */
  shininess: number;
}

export const DEFAULT_LIGHTING_CONFIG: Readonly<LightingConfig> = {
  ambientStrength: 0.1,
  shininess: 32.0,
};

const assertNonNegative = (name: string, value: number): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(
      `Invalid lighting config: ${name} must be a finite, non-negative number (got ${value})`,
    );
  }
};

/**
 * Fills in defaults for any missing lighting parameter and validates the
 * result.
 *
 * @param options Partial overrides of the default config.
 * @returns A complete config.
 * @throws If a value is negative, NaN or infinite.
 */
export const resolveLightingConfig = (
  options: Partial<LightingConfig> = {},
): LightingConfig => {
  const config: LightingConfig = {
    ambientStrength:
      options.ambientStrength ?? DEFAULT_LIGHTING_CONFIG.ambientStrength,
    shininess: options.shininess ?? DEFAULT_LIGHTING_CONFIG.shininess,
  };

  assertNonNegative("ambientStrength", config.ambientStrength);
  assertNonNegative("shininess", config.shininess);

  return config;
};

/**
 * Maps a lighting config onto the `override` declarations of the lit shader.
 */
export const toShaderConstants = (
  config: LightingConfig,
): Record<string, number> => ({
  ambient_strength: config.ambientStrength,
  shininess: config.shininess,
});
