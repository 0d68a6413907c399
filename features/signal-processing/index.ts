/**
 * Signal Processing Module
 *
 * WT901 frame decoding and unit scaling.
 */

// Types
export type { Vector3, Orientation, SensorSample, RawFrameFields } from "./types";

// Unit Scaling
export {
  scaleAccel,
  scaleGyro,
  scaleAngle,
  magnitude,
  compensateMagnitude,
} from "./unit-scaler";

// Frame Decoding
export {
  decodeFrames,
  decodeAllFrames,
  decodeFrame,
  findFrameHeader,
  isFrameHeaderAt,
  sampleFromRaw,
} from "./frame-decoder";
