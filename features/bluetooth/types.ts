import type { SensorSample } from "@/features/signal-processing";
import type { KickEvent } from "@/features/kick-detection";
import type { ErrorInfo } from "./errors";

// ============================================================================
// SESSION
// ============================================================================

/**
 * Handshake states in order. Each advances only when the operation it
 * started is acknowledged; any failure or disconnect returns to
 * "disconnected".
 */
export type SessionState =
  | "disconnected"
  | "discovering"
  | "unlocking"
  | "settingRate"
  | "savingConfig"
  | "enablingNotifications"
  | "streaming";

/** Characteristics the handshake located during discovery. */
export interface SensorCharacteristics {
  serviceUuid: string;
  notifyId: string;
  writeId: string;
}

export interface SessionStats {
  payloadsReceived: number;
  samplesDecoded: number;
  kicksDetected: number;
}

export type DeviceSessionEvent =
  | { type: "stateChanged"; state: SessionState; previousState: SessionState }
  | { type: "sample"; sample: SensorSample }
  | { type: "kick"; event: KickEvent }
  | { type: "error"; error: ErrorInfo; cause: Error };

export type DeviceSessionListener = (event: DeviceSessionEvent) => void;

// ============================================================================
// SCANNING
// ============================================================================

export interface DiscoveredSensor {
  id: string;
  name: string;
  rssi: number;
}

export type SensorScannerEvent =
  | { type: "deviceDiscovered"; device: DiscoveredSensor }
  | { type: "scanStateChanged"; scanning: boolean };

export type SensorScannerListener = (event: SensorScannerEvent) => void;
