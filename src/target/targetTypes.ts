export type EmissionTarget = 'c-abi' | 'host-extension';

/**
 * Build-time selection of the consumer surface.
 *
 * `dual` emits both paths, each gated on the host feature flag of the
 * generated crate, so the choice is made by cargo features rather than at
 * run time.
 */
export type EmissionMode =
  | { kind: 'single'; target: EmissionTarget }
  | { kind: 'dual'; hostFeature: string };

export type TargetSetting = EmissionTarget | 'dual';

export const DEFAULT_HOST_FEATURE = 'python';
