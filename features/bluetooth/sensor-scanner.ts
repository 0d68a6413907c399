/**
 * Sensor Scanner
 *
 * Scans with a noble-compatible BLE central and keeps the WT901 devices it
 * sees. How long to scan is the caller's decision.
 */

import { Wt901Scan } from "@/constants/device";
import { createLogger, type Logger } from "@/lib/logger";
import { TransportError } from "./errors";
import type { GattPeripheral } from "./noble-transport";
import type { DiscoveredSensor, SensorScannerEvent, SensorScannerListener } from "./types";

export interface BleCentral {
  startScanningAsync(serviceUUIDs?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
  on(event: "discover", listener: (peripheral: GattPeripheral) => void): unknown;
  removeListener(event: "discover", listener: (peripheral: GattPeripheral) => void): unknown;
}

export interface SensorScannerOptions {
  /** Case-insensitive substring of the advertised local name. */
  namePattern?: string;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isBleCentral(value: unknown): value is BleCentral {
  return (
    isRecord(value) &&
    typeof value.startScanningAsync === "function" &&
    typeof value.stopScanningAsync === "function" &&
    typeof value.on === "function" &&
    typeof value.removeListener === "function"
  );
}

/**
 * Import @abandonware/noble on demand. Loading it binds to the host's
 * Bluetooth adapter, so nothing else in the package imports it eagerly.
 */
export async function loadNobleCentral(): Promise<BleCentral> {
  let mod: unknown;
  try {
    mod = await import("@abandonware/noble");
  } catch (err) {
    throw new TransportError("SCAN_FAILED", "Could not load @abandonware/noble", { cause: err });
  }
  const central = isRecord(mod) && "default" in mod ? mod.default : mod;
  if (!isBleCentral(central)) {
    throw new TransportError("SCAN_FAILED", "@abandonware/noble did not expose a BLE central");
  }
  return central;
}

// ============================================================================
// SCANNER
// ============================================================================

export class SensorScanner {
  private devices = new Map<string, DiscoveredSensor>();
  private peripherals = new Map<string, GattPeripheral>();
  private listeners = new Set<SensorScannerListener>();
  private scanning = false;
  private finishScan: (() => void) | null = null;
  private scanTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly namePattern: string;
  private readonly logger: Logger;

  constructor(
    private readonly central: BleCentral,
    options: SensorScannerOptions = {},
  ) {
    this.namePattern = (options.namePattern ?? Wt901Scan.NAME_PATTERN).toLowerCase();
    this.logger = options.logger ?? createLogger("Scan");
  }

  isScanning(): boolean {
    return this.scanning;
  }

  getDevices(): DiscoveredSensor[] {
    return [...this.devices.values()];
  }

  getPeripheral(id: string): GattPeripheral | undefined {
    return this.peripherals.get(id);
  }

  addEventListener(listener: SensorScannerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: SensorScannerEvent): void {
    this.listeners.forEach((fn) => {
      try {
        fn(event);
      } catch (e) {
        this.logger.error("Event listener error:", e);
      }
    });
  }

  // ============================================================================
  // SCANNING
  // ============================================================================

  /**
   * Scan for `durationMs`, or until `stop()`, and resolve with the devices
   * found. Each scan starts from an empty list.
   */
  async scan(durationMs: number = Wt901Scan.DEFAULT_SCAN_DURATION_MS): Promise<DiscoveredSensor[]> {
    if (this.scanning) throw new TransportError("SCAN_FAILED", "Scan already in progress");

    this.devices.clear();
    this.peripherals.clear();
    this.scanning = true;
    this.central.on("discover", this.handleDiscover);
    const finished = new Promise<void>((resolve) => {
      this.finishScan = resolve;
      this.scanTimer = setTimeout(resolve, durationMs);
    });
    this.emit({ type: "scanStateChanged", scanning: true });
    this.logger.info("Scanning...");

    try {
      await this.central.startScanningAsync([], false);
    } catch (err) {
      this.endScan();
      throw new TransportError("SCAN_FAILED", "Could not start scanning", { cause: err });
    }

    await finished;
    try {
      await this.central.stopScanningAsync();
    } catch (err) {
      this.logger.warn("Stopping the scan failed:", err);
    }
    this.endScan();
    this.logger.info(`Scan stopped, ${this.devices.size} device(s) found`);
    return this.getDevices();
  }

  /** End a running scan early; `scan()` then resolves with what it found. */
  stop(): void {
    this.finishScan?.();
  }

  private endScan(): void {
    if (this.scanTimer) clearTimeout(this.scanTimer);
    this.scanTimer = null;
    this.finishScan = null;
    this.central.removeListener("discover", this.handleDiscover);
    this.scanning = false;
    this.emit({ type: "scanStateChanged", scanning: false });
  }

  private handleDiscover = (peripheral: GattPeripheral): void => {
    const name = peripheral.advertisement.localName;
    if (!name || !name.toLowerCase().includes(this.namePattern)) return;

    const device: DiscoveredSensor = { id: peripheral.id, name, rssi: peripheral.rssi };
    if (!this.devices.has(device.id)) this.logger.info(`Found: ${name} (${device.id})`);
    this.devices.set(device.id, device);
    this.peripherals.set(device.id, peripheral);
    this.emit({ type: "deviceDiscovered", device });
  };
}
