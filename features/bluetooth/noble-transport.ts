/**
 * Noble Transport
 *
 * Adapts a peripheral from @abandonware/noble to `SensorTransport`.
 * The Gatt* interfaces below are the subset of noble's objects this module
 * uses, so tests can hand in EventEmitter fakes instead of real hardware.
 */

import { createLogger, type Logger } from "@/lib/logger";
import { TransportError } from "./errors";
import {
  normalizeUuid,
  type DisconnectListener,
  type GattServiceInfo,
  type NotificationListener,
  type SensorTransport,
} from "./transport";

// ============================================================================
// NOBLE SHAPES
// ============================================================================

export interface GattCharacteristic {
  readonly uuid: string;
  readonly properties: readonly string[];
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
  subscribeAsync(): Promise<void>;
  on(event: "data", listener: (data: Buffer, isNotification: boolean) => void): unknown;
}

export interface GattService {
  readonly uuid: string;
  readonly characteristics: readonly GattCharacteristic[];
}

export interface GattPeripheral {
  readonly id: string;
  readonly rssi: number;
  readonly advertisement: { localName?: string };
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverAllServicesAndCharacteristicsAsync(): Promise<{
    services: GattService[];
    characteristics: GattCharacteristic[];
  }>;
  once(event: "disconnect", listener: (reason?: unknown) => void): unknown;
}

export interface NobleTransportOptions {
  logger?: Logger;
}

// ============================================================================
// TRANSPORT
// ============================================================================

export class NobleTransport implements SensorTransport {
  // Keyed by normalised uuid. A uuid present in several services maps to the first.
  private characteristics = new Map<string, GattCharacteristic>();
  private wired = new WeakSet<GattCharacteristic>();
  private notificationListeners = new Set<NotificationListener>();
  private disconnectListeners = new Set<DisconnectListener>();
  private connected = false;
  private readonly logger: Logger;

  constructor(
    private readonly peripheral: GattPeripheral,
    options: NobleTransportOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("BLE");
  }

  get id(): string {
    return this.peripheral.id;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  async connect(): Promise<void> {
    if (this.connected) return;
    const name = this.peripheral.advertisement.localName ?? this.peripheral.id;
    this.logger.info(`Connecting to ${name}...`);
    try {
      await this.peripheral.connectAsync();
    } catch (err) {
      throw new TransportError("CONNECT_FAILED", `Could not connect to ${name}`, { cause: err });
    }
    this.connected = true;
    this.peripheral.once("disconnect", (reason) => this.handleDisconnect(reason));
    this.logger.info(`Connected to ${name}`);
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.logger.info("Disconnecting...");
    await this.peripheral.disconnectAsync();
  }

  onDisconnect(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  private handleDisconnect(reason: unknown): void {
    this.connected = false;
    this.characteristics.clear();
    const detail = reason === undefined || reason === null ? undefined : String(reason);
    this.logger.warn(detail ? `Disconnected: ${detail}` : "Disconnected");
    this.disconnectListeners.forEach((fn) => {
      try {
        fn(detail);
      } catch (e) {
        this.logger.error("Disconnect listener error:", e);
      }
    });
  }

  // ============================================================================
  // GATT OPERATIONS
  // ============================================================================

  async discoverServices(): Promise<GattServiceInfo[]> {
    let services: GattService[];
    try {
      ({ services } = await this.peripheral.discoverAllServicesAndCharacteristicsAsync());
    } catch (err) {
      throw new TransportError("DISCOVERY_FAILED", "Service discovery failed", { cause: err });
    }

    this.characteristics.clear();
    for (const service of services) {
      this.logger.debug(`Service ${service.uuid}`);
      for (const c of service.characteristics) {
        const key = normalizeUuid(c.uuid);
        if (!this.characteristics.has(key)) this.characteristics.set(key, c);
      }
    }

    return services.map((s) => ({
      uuid: s.uuid,
      characteristicIds: s.characteristics.map((c) => c.uuid),
    }));
  }

  /** Written with response: the promise settles on the peripheral's acknowledgment. */
  async writeCharacteristic(characteristicId: string, data: Uint8Array): Promise<void> {
    const characteristic = this.lookup(characteristicId);
    try {
      await characteristic.writeAsync(Buffer.from(data), false);
    } catch (err) {
      throw new TransportError("WRITE_FAILED", `Write to ${characteristicId} failed`, { cause: err });
    }
  }

  async enableNotifications(characteristicId: string): Promise<void> {
    const characteristic = this.lookup(characteristicId);
    if (!this.wired.has(characteristic)) {
      this.wired.add(characteristic);
      characteristic.on("data", (data) => this.dispatch(characteristic.uuid, data));
    }
    try {
      await characteristic.subscribeAsync();
    } catch (err) {
      throw new TransportError(
        "DESCRIPTOR_FAILED",
        `Enabling notifications on ${characteristicId} failed`,
        { cause: err },
      );
    }
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.add(listener);
    return () => this.notificationListeners.delete(listener);
  }

  private dispatch(characteristicId: string, payload: Uint8Array): void {
    this.notificationListeners.forEach((fn) => {
      try {
        fn(characteristicId, payload);
      } catch (e) {
        this.logger.error("Notification listener error:", e);
      }
    });
  }

  private lookup(characteristicId: string): GattCharacteristic {
    const characteristic = this.characteristics.get(normalizeUuid(characteristicId));
    if (!characteristic) {
      throw new TransportError(
        "UNKNOWN_CHARACTERISTIC",
        `Characteristic ${characteristicId} was not discovered`,
      );
    }
    return characteristic;
  }
}
