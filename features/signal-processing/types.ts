/**
 * Signal Processing Types
 */

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Orientation {
  /** Degrees. */
  roll: number;
  /** Degrees. */
  pitch: number;
  /** Degrees. */
  yaw: number;
}

/**
 * One decoded telemetry frame in physical units.
 */
export interface SensorSample {
  /** Acceleration in g. */
  readonly accel: Readonly<Vector3>;
  /** Angular rate in °/s. */
  readonly gyro: Readonly<Vector3>;
  readonly orientation: Readonly<Orientation>;
  /** Euclidean norm of `accel`, in g. */
  readonly accelMagnitude: number;
  /** `max(0, accelMagnitude - baseline)`, in g. */
  readonly compensatedMagnitude: number;
}

/**
 * The nine int16 fields of a frame, in wire order.
 */
export interface RawFrameFields {
  ax: number;
  ay: number;
  az: number;
  wx: number;
  wy: number;
  wz: number;
  roll: number;
  pitch: number;
  yaw: number;
}
