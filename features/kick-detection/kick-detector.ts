/**
 * Kick Detector
 *
 * Deadband hysteresis over the compensated acceleration magnitude.
 *
 *   armed    + value > upper  → emit kick, disarm
 *   disarmed + value < lower  → re-arm (no event)
 *   otherwise                 → nothing
 *
 * The gap between the two edges absorbs the ringing that follows a single
 * impact, so one kick fires once. Thresholds live in an immutable snapshot
 * that setters replace wholesale; `process` reads it once per call.
 */
import { ThresholdDefaults } from "@/constants/sensor";
import { createLogger, type Logger } from "@/lib/logger";
import type { DetectorState, KickEvent, KickListener, ThresholdConfig } from "./types";

export interface KickDetectorOptions {
  thresholds?: Partial<ThresholdConfig>;
  logger?: Logger;
}

function clampUpper(value: number): number {
  return Math.max(value, ThresholdDefaults.UPPER_FLOOR_G);
}

function clampLower(value: number): number {
  return Math.max(value, ThresholdDefaults.LOWER_FLOOR_G);
}

export class KickDetector {
  private thresholds: ThresholdConfig;
  private state: DetectorState = "armed";
  private listeners = new Set<KickListener>();
  private readonly logger: Logger;

  constructor(options: KickDetectorOptions = {}) {
    this.logger = options.logger ?? createLogger("Kick");
    const upper = options.thresholds?.upperThreshold;
    const lower = options.thresholds?.lowerThreshold;
    this.thresholds = Object.freeze({
      upperThreshold: clampUpper(
        upper !== undefined && Number.isFinite(upper) ? upper : ThresholdDefaults.UPPER_G,
      ),
      lowerThreshold: clampLower(
        lower !== undefined && Number.isFinite(lower) ? lower : ThresholdDefaults.LOWER_G,
      ),
    });
    this.warnIfInverted();
  }

  // ============================================================================
  // PROCESSING
  // ============================================================================

  /**
   * Feed one compensated-magnitude value. Returns the kick it fired, if any.
   * Non-finite values are ignored.
   */
  process(value: number): KickEvent | null {
    if (!Number.isFinite(value)) {
      this.logger.debug(`Ignoring non-finite value: ${value}`);
      return null;
    }

    const { upperThreshold, lowerThreshold } = this.thresholds;

    if (this.state === "armed" && value > upperThreshold) {
      const event: KickEvent = {
        intensity: Math.min(value / upperThreshold, ThresholdDefaults.MAX_INTENSITY),
        magnitude: value,
      };
      this.state = "disarmed";
      this.logger.debug(`Kick detected! Intensity: ${event.intensity}, Accel: ${value}`);
      this.emit(event);
      return event;
    }

    if (this.state === "disarmed" && value < lowerThreshold) {
      this.state = "armed";
      this.logger.debug("Re-armed for next kick");
    }

    return null;
  }

  /** Force the armed state, e.g. after the sensor reconnects. */
  reset(): void {
    this.state = "armed";
    this.logger.debug("Detector reset");
  }

  // ============================================================================
  // THRESHOLDS
  // ============================================================================

  getThresholds(): ThresholdConfig {
    return this.thresholds;
  }

  /** Returns the value actually applied after clamping to the 0.1 g floor. */
  setUpperThreshold(value: number): number {
    if (!Number.isFinite(value)) {
      this.logger.warn(`Rejected non-finite upper threshold: ${value}`);
      return this.thresholds.upperThreshold;
    }
    this.thresholds = Object.freeze({ ...this.thresholds, upperThreshold: clampUpper(value) });
    this.logger.info(`Upper threshold set to: ${this.thresholds.upperThreshold}`);
    this.warnIfInverted();
    return this.thresholds.upperThreshold;
  }

  /** Returns the value actually applied after clamping to the 0.01 g floor. */
  setLowerThreshold(value: number): number {
    if (!Number.isFinite(value)) {
      this.logger.warn(`Rejected non-finite lower threshold: ${value}`);
      return this.thresholds.lowerThreshold;
    }
    this.thresholds = Object.freeze({ ...this.thresholds, lowerThreshold: clampLower(value) });
    this.logger.info(`Lower threshold set to: ${this.thresholds.lowerThreshold}`);
    this.warnIfInverted();
    return this.thresholds.lowerThreshold;
  }

  /**
   * Replace both edges in one swap so `process` never sees a half-applied
   * pair. A non-finite value keeps that edge unchanged.
   */
  setThresholds(upper: number, lower: number): ThresholdConfig {
    const current = this.thresholds;
    this.thresholds = Object.freeze({
      upperThreshold: Number.isFinite(upper) ? clampUpper(upper) : current.upperThreshold,
      lowerThreshold: Number.isFinite(lower) ? clampLower(lower) : current.lowerThreshold,
    });
    this.logger.info(
      `Thresholds set to: upper=${this.thresholds.upperThreshold}, lower=${this.thresholds.lowerThreshold}`,
    );
    this.warnIfInverted();
    return this.thresholds;
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): DetectorState {
    return this.state;
  }

  isArmed(): boolean {
    return this.state === "armed";
  }

  onKick(listener: KickListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: KickEvent): void {
    this.listeners.forEach((fn) => {
      try {
        fn(event);
      } catch (e) {
        this.logger.error("Kick listener error:", e);
      }
    });
  }

  // An inverted pair removes the deadband. Reported, not corrected.
  private warnIfInverted(): void {
    const { upperThreshold, lowerThreshold } = this.thresholds;
    if (lowerThreshold >= upperThreshold) {
      this.logger.warn(
        `Lower threshold ${lowerThreshold} >= upper threshold ${upperThreshold}; no hysteresis deadband`,
      );
    }
  }
}
