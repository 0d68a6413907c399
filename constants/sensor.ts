/**
 * Sensor Configuration
 *
 * Frame layout, scaling constants and detector tuning for the WT901 IMU.
 * These must match the sensor's binary output format.
 */

// ============================================================================
// FRAME LAYOUT
// ============================================================================

export const FrameConfig = {
  /**
   * Total frame size: 2-byte header + 9 × int16 fields = 20 bytes.
   */
  FRAME_SIZE: 20,

  /**
   * First synchronization byte.
   */
  HEADER_BYTE_0: 0x55,

  /**
   * Second synchronization byte (combined accel/gyro/angle packet).
   */
  HEADER_BYTE_1: 0x61,

  /**
   * Header length in bytes.
   */
  HEADER_SIZE: 2,

  /**
   * Number of little-endian int16 fields after the header.
   * Order: ax, ay, az, wx, wy, wz, roll, pitch, yaw.
   */
  FIELD_COUNT: 9,

  /**
   * Bytes per field (int16).
   */
  BYTES_PER_FIELD: 2,
} as const;

// ============================================================================
// SCALING
// ============================================================================

export const ScaleConfig = {
  /**
   * Raw full-scale value of a signed 16-bit reading.
   */
  RAW_FULL_SCALE: 32768.0,

  /**
   * Accelerometer range: ±16 g.
   */
  ACCEL_RANGE_G: 16.0,

  /**
   * Gyroscope range: ±2000 °/s.
   */
  GYRO_RANGE_DPS: 2000.0,

  /**
   * Angle range: ±180°.
   */
  ANGLE_RANGE_DEG: 180.0,

  /**
   * Baseline subtracted from the acceleration magnitude (gravity plus
   * mounting offset on the bag), in g.
   */
  BASELINE_OFFSET_G: 2.09,
} as const;

// ============================================================================
// KICK DETECTION
// ============================================================================

export const ThresholdDefaults = {
  /** Trigger edge, in g of compensated magnitude. */
  UPPER_G: 1.5,

  /** Re-arm edge, in g of compensated magnitude. */
  LOWER_G: 0.1,

  UPPER_FLOOR_G: 0.1,

  LOWER_FLOOR_G: 0.01,

  /**
   * Intensity is magnitude / upper threshold, capped here so the
   * downstream volume mapping has a bounded input.
   */
  MAX_INTENSITY: 2.0,
} as const;

export const PlaybackVolume = {
  MIN: 0.3,
  MAX: 1.0,
} as const;
