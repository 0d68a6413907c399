/**
 * kicksense
 *
 * Kick detection for WT901 BLE motion sensors: frame decoding, unit
 * scaling, hysteresis kick detection and the device configuration session.
 */

export * from "./features/signal-processing";
export * from "./features/kick-detection";
export * from "./features/bluetooth";
export {
  createLogger,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  type Logger,
  type LogLevel,
} from "./lib/logger";
export * from "./constants/sensor";
export * from "./constants/device";
