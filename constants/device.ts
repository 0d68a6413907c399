/**
 * WT901 BLE Device Constants
 *
 * GATT identifiers, configuration commands and session timing for the
 * WitMotion WT901 family. The sensor uses the vendor UUID base
 * `-0000-1000-8000-00805f9a34fb` (note `9a`, not the Bluetooth SIG `9b`).
 */

export const Wt901Gatt = {
  SERVICE_UUID: "0000ffe0-0000-1000-8000-00805f9a34fb",
  /** Telemetry notifications (sensor → host). */
  NOTIFY_CHAR_UUID: "0000ffe4-0000-1000-8000-00805f9a34fb",
  /** Command writes (host → sensor). */
  WRITE_CHAR_UUID: "0000ffe9-0000-1000-8000-00805f9a34fb",
} as const;

export const Wt901Commands = {
  UNLOCK: Uint8Array.of(0xff, 0xaa, 0x69, 0x88, 0xb5),
  SET_RATE_100HZ: Uint8Array.of(0xff, 0xaa, 0x03, 0x09, 0x00),
  SAVE_CONFIG: Uint8Array.of(0xff, 0xaa, 0x00, 0x00, 0x00),
} as const;

export const Wt901Scan = {
  /** Matched case-insensitively against the advertised local name. */
  NAME_PATTERN: "wt901",
  DEFAULT_SCAN_DURATION_MS: 10_000,
} as const;

export const SessionConfig = {
  /** Per-step acknowledgment timeout for command and descriptor writes. */
  STEP_ACK_TIMEOUT_MS: 5_000,
} as const;
