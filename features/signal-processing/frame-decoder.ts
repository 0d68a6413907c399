/**
 * Frame Decoder
 *
 * Decodes WT901 telemetry frames from BLE notification payloads.
 *
 * Frame format (20 bytes, little-endian):
 *   [0x55][0x61][int16 ax][ay][az][wx][wy][wz][roll][pitch][yaw]
 *
 * A single notification may carry zero, one or several frames, and may start
 * or end mid-frame. The scanner moves one byte at a time until it sees the
 * header, then consumes the whole frame. Trailing bytes shorter than a frame
 * yield nothing.
 */
import { FrameConfig } from "@/constants/sensor";
import type { RawFrameFields, SensorSample } from "./types";
import {
  compensateMagnitude,
  magnitude,
  scaleAccel,
  scaleAngle,
  scaleGyro,
} from "./unit-scaler";

const { FRAME_SIZE, HEADER_SIZE, HEADER_BYTE_0, HEADER_BYTE_1, BYTES_PER_FIELD } =
  FrameConfig;

// ============================================================================
// HEADER / FIELD ACCESS
// ============================================================================

export function isFrameHeaderAt(data: Uint8Array, offset: number): boolean {
  return data[offset] === HEADER_BYTE_0 && data[offset + 1] === HEADER_BYTE_1;
}

/**
 * Index of the next header at or after `from`, or -1. Only headers with a
 * complete frame behind them count.
 */
export function findFrameHeader(data: Uint8Array, from: number = 0): number {
  for (let offset = Math.max(0, from); offset + FRAME_SIZE <= data.length; offset++) {
    if (isFrameHeaderAt(data, offset)) return offset;
  }
  return -1;
}

function readRawFields(view: DataView, payloadOffset: number): RawFrameFields {
  const at = (index: number) => view.getInt16(payloadOffset + index * BYTES_PER_FIELD, true);
  return {
    ax: at(0),
    ay: at(1),
    az: at(2),
    wx: at(3),
    wy: at(4),
    wz: at(5),
    roll: at(6),
    pitch: at(7),
    yaw: at(8),
  };
}

// ============================================================================
// SAMPLE CONSTRUCTION
// ============================================================================

export function sampleFromRaw(raw: RawFrameFields): SensorSample {
  const accel = {
    x: scaleAccel(raw.ax),
    y: scaleAccel(raw.ay),
    z: scaleAccel(raw.az),
  };
  const accelMagnitude = magnitude(accel.x, accel.y, accel.z);

  return {
    accel,
    gyro: {
      x: scaleGyro(raw.wx),
      y: scaleGyro(raw.wy),
      z: scaleGyro(raw.wz),
    },
    orientation: {
      roll: scaleAngle(raw.roll),
      pitch: scaleAngle(raw.pitch),
      yaw: scaleAngle(raw.yaw),
    },
    accelMagnitude,
    compensatedMagnitude: compensateMagnitude(accelMagnitude),
  };
}

// ============================================================================
// DECODING
// ============================================================================

/**
 * Lazily decode every frame in `data`, in order.
 *
 * On a header match the full 20 bytes are consumed; otherwise the scan
 * advances by exactly one byte. Scanning stops when fewer than 20 bytes
 * remain.
 */
export function* decodeFrames(data: Uint8Array): Generator<SensorSample, void, undefined> {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  let offset = 0;

  while (offset + FRAME_SIZE <= data.length) {
    if (!isFrameHeaderAt(data, offset)) {
      offset += 1;
      continue;
    }

    yield sampleFromRaw(readRawFields(view, offset + HEADER_SIZE));
    offset += FRAME_SIZE;
  }
}

export function decodeAllFrames(data: Uint8Array): SensorSample[] {
  return Array.from(decodeFrames(data));
}

/**
 * Decode exactly one frame. Returns null unless `frame` is 20 bytes long and
 * starts with the header.
 */
export function decodeFrame(frame: Uint8Array): SensorSample | null {
  if (frame.length !== FRAME_SIZE || !isFrameHeaderAt(frame, 0)) return null;
  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  return sampleFromRaw(readRawFields(view, HEADER_SIZE));
}
