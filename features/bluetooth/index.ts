/**
 * Bluetooth Module
 *
 * WT901 scanning, the noble transport and the configuration session.
 */

// Types
export type {
  SessionState,
  SessionStats,
  SensorCharacteristics,
  DeviceSessionEvent,
  DeviceSessionListener,
  DiscoveredSensor,
  SensorScannerEvent,
  SensorScannerListener,
} from "./types";
export type {
  SensorTransport,
  GattServiceInfo,
  NotificationListener,
  DisconnectListener,
} from "./transport";
export { normalizeUuid, sameUuid } from "./transport";

// Errors
export {
  TransportError,
  ConfigurationError,
  toErrorInfo,
  type TransportErrorCode,
  type ConfigurationErrorCode,
  type ErrorInfo,
} from "./errors";

// Session
export { DeviceSession, locateCharacteristics, type DeviceSessionOptions } from "./device-session";
export { openSensorSession } from "./open-session";

// Noble
export {
  NobleTransport,
  type NobleTransportOptions,
  type GattCharacteristic,
  type GattService,
  type GattPeripheral,
} from "./noble-transport";
export {
  SensorScanner,
  loadNobleCentral,
  type BleCentral,
  type SensorScannerOptions,
} from "./sensor-scanner";
