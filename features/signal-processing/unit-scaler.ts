/**
 * Unit Scaler
 *
 * Raw int16 readings → physical units. Every int16 is a valid input.
 */
import { ScaleConfig } from "@/constants/sensor";

/** Raw accelerometer reading → g (±16 g). */
export function scaleAccel(raw: number): number {
  return (raw * ScaleConfig.ACCEL_RANGE_G) / ScaleConfig.RAW_FULL_SCALE;
}

/** Raw gyroscope reading → °/s (±2000 °/s). */
export function scaleGyro(raw: number): number {
  return (raw * ScaleConfig.GYRO_RANGE_DPS) / ScaleConfig.RAW_FULL_SCALE;
}

/** Raw angle reading → degrees (±180°). */
export function scaleAngle(raw: number): number {
  return (raw * ScaleConfig.ANGLE_RANGE_DEG) / ScaleConfig.RAW_FULL_SCALE;
}

export function magnitude(x: number, y: number, z: number): number {
  return Math.sqrt(x * x + y * y + z * z);
}

/**
 * Subtract the fixed gravity/mounting baseline, floored at zero.
 */
export function compensateMagnitude(
  accelMagnitude: number,
  baseline: number = ScaleConfig.BASELINE_OFFSET_G,
): number {
  return Math.max(0, accelMagnitude - baseline);
}
