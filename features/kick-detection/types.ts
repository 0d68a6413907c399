export type DetectorState = "armed" | "disarmed";

/**
 * Trigger and re-arm edges, in g of compensated magnitude. Replaced as a
 * whole on every change; never mutated in place.
 */
export interface ThresholdConfig {
  readonly upperThreshold: number;
  readonly lowerThreshold: number;
}

export interface KickEvent {
  /** magnitude / upperThreshold, capped at 2.0. Dimensionless. */
  readonly intensity: number;
  /** The compensated magnitude that fired the kick, in g. */
  readonly magnitude: number;
}

export type KickListener = (event: KickEvent) => void;
