import { describe, it, expect } from "vitest";
import {
  decodeFrames,
  decodeAllFrames,
  decodeFrame,
  findFrameHeader,
  isFrameHeaderAt,
} from "../frame-decoder";
import type { RawFrameFields } from "../types";

const FIELD_ORDER: (keyof RawFrameFields)[] = [
  "ax", "ay", "az", "wx", "wy", "wz", "roll", "pitch", "yaw",
];

function frame(fields: Partial<RawFrameFields> = {}): Uint8Array {
  const bytes = new Uint8Array(20);
  bytes[0] = 0x55;
  bytes[1] = 0x61;
  const view = new DataView(bytes.buffer);
  FIELD_ORDER.forEach((key, i) => view.setInt16(2 + i * 2, fields[key] ?? 0, true));
  return bytes;
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

describe("decodeFrame", () => {
  it("decodes the resting reference frame", () => {
    const bytes = Uint8Array.of(
      0x55, 0x61, 0x00, 0x00, 0x00, 0x00, 0xc8, 0x00, 0x00, 0x00,
      0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    );
    const sample = decodeFrame(bytes);
    expect(sample).not.toBeNull();
    expect(sample?.accel).toEqual({ x: 0, y: 0, z: 0.09765625 });
    expect(sample?.accelMagnitude).toBe(0.09765625);
    expect(sample?.compensatedMagnitude).toBe(0);
  });

  it("scales every field group", () => {
    const sample = decodeFrame(
      frame({ ax: 8192, ay: 8192, az: 8192, wx: 16384, wy: -16384, wz: 0, roll: -16384, pitch: 8192, yaw: 32767 }),
    );
    expect(sample?.accel).toEqual({ x: 4, y: 4, z: 4 });
    expect(sample?.gyro).toEqual({ x: 1000, y: -1000, z: 0 });
    expect(sample?.orientation.roll).toBe(-90);
    expect(sample?.orientation.pitch).toBe(45);
    expect(sample?.orientation.yaw).toBeCloseTo(179.9945, 4);
    expect(sample?.accelMagnitude).toBeCloseTo(Math.sqrt(48), 10);
    expect(sample?.compensatedMagnitude).toBeCloseTo(Math.sqrt(48) - 2.09, 10);
  });

  it("reads fields as signed little-endian", () => {
    const bytes = frame();
    bytes[2] = 0xff;
    bytes[3] = 0xff; // ax = -1
    bytes[4] = 0x00;
    bytes[5] = 0x80; // ay = -32768
    const sample = decodeFrame(bytes);
    expect(sample?.accel.x).toBe(-16 / 32768);
    expect(sample?.accel.y).toBe(-16);
  });

  it("rejects wrong length or header", () => {
    expect(decodeFrame(frame().subarray(0, 19))).toBeNull();
    expect(decodeFrame(concat(frame(), Uint8Array.of(0)))).toBeNull();
    const bad = frame();
    bad[1] = 0x62;
    expect(decodeFrame(bad)).toBeNull();
  });
});

describe("decodeFrames", () => {
  it("yields two samples for two concatenated frames, in order", () => {
    const a = frame({ ax: 4096 });
    const b = frame({ az: -2048, yaw: 100 });
    const samples = decodeAllFrames(concat(a, b));
    expect(samples).toHaveLength(2);
    expect(samples[0]).toEqual(decodeFrame(a));
    expect(samples[1]).toEqual(decodeFrame(b));
  });

  it("resynchronizes past a stray leading byte", () => {
    const valid = frame({ ax: 6000 });
    const samples = decodeAllFrames(concat(Uint8Array.of(0x13), valid));
    expect(samples).toHaveLength(1);
    expect(samples[0]).toEqual(decodeFrame(valid));
  });

  it("skips several junk bytes including a lone header byte", () => {
    const valid = frame({ wz: 500 });
    const samples = decodeAllFrames(concat(Uint8Array.of(0x00, 0x55, 0x55, 0x61 + 1), valid));
    expect(samples).toHaveLength(1);
    expect(samples[0]).toEqual(decodeFrame(valid));
  });

  it("yields nothing for buffers shorter than a frame", () => {
    expect(decodeAllFrames(new Uint8Array(0))).toEqual([]);
    expect(decodeAllFrames(frame().subarray(0, 19))).toEqual([]);
  });

  it("ignores a trailing partial frame", () => {
    const a = frame({ ax: 1 });
    const samples = decodeAllFrames(concat(a, frame({ ax: 2 }).subarray(0, 12)));
    expect(samples).toHaveLength(1);
    expect(samples[0]).toEqual(decodeFrame(a));
  });

  it("recovers on the next frame after a dropped byte", () => {
    const truncated = frame({ ax: 10 }).subarray(0, 19);
    const second = frame();
    const third = frame({ ay: 300 });
    const samples = decodeAllFrames(concat(truncated, second, third));
    // The truncated frame swallows the first byte of `second`.
    expect(samples).toHaveLength(2);
    expect(samples[0].accel.x).toBe((10 * 16) / 32768);
    expect(samples[1]).toEqual(decodeFrame(third));
  });

  it("decodes from a view with a non-zero byte offset", () => {
    const backing = concat(Uint8Array.of(1, 2, 3), frame({ az: 2048 }));
    const view = backing.subarray(3);
    const samples = decodeAllFrames(view);
    expect(samples).toHaveLength(1);
    expect(samples[0].accel.z).toBe(1);
  });

  it("is lazy and not restartable", () => {
    const iterator = decodeFrames(concat(frame({ ax: 1 }), frame({ ax: 2 })));
    const first = iterator.next();
    expect(first.done).toBe(false);
    if (!first.done) expect(first.value.accel.x).toBe(16 / 32768);
    expect(iterator.next().done).toBe(false);
    expect(iterator.next().done).toBe(true);
    expect(Array.from(iterator)).toEqual([]);
  });

  it("yields nothing for header-free noise", () => {
    const noise = new Uint8Array(256 * 1024);
    for (let i = 0; i < noise.length; i++) {
      const b = (i * 37 + 11) & 0xff;
      noise[i] = b === 0x61 ? 0x62 : b;
    }
    expect(decodeAllFrames(noise)).toEqual([]);
  });

  it("never produces a negative compensated magnitude", () => {
    const extremes = [-32768, -1, 0, 1, 32767];
    const frames = extremes.map((v) => frame({ ax: v, ay: v, az: v }));
    for (const sample of decodeFrames(concat(...frames))) {
      expect(sample.compensatedMagnitude).toBeGreaterThanOrEqual(0);
    }
  });
});

describe("findFrameHeader", () => {
  it("finds the first complete frame", () => {
    const data = concat(Uint8Array.of(9, 9), frame());
    expect(findFrameHeader(data)).toBe(2);
    expect(isFrameHeaderAt(data, 2)).toBe(true);
  });
  it("returns -1 when no complete frame follows a header", () => {
    expect(findFrameHeader(frame().subarray(0, 19))).toBe(-1);
    expect(findFrameHeader(frame(), 1)).toBe(-1);
  });
});
