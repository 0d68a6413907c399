/**
 * Transport contract consumed by the device session.
 *
 * The session never touches a BLE stack directly. A transport exposes
 * discovery, acknowledged writes, notification enablement and a push
 * channel for inbound payloads. `NobleTransport` is the Node.js
 * implementation; tests use an in-process fake.
 */

/** A discovered GATT service and the characteristic identifiers it holds. */
export interface GattServiceInfo {
  readonly uuid: string;
  readonly characteristicIds: readonly string[];
}

export type NotificationListener = (characteristicId: string, payload: Uint8Array) => void;
export type DisconnectListener = (reason?: string) => void;

export interface SensorTransport {
  discoverServices(): Promise<GattServiceInfo[]>;
  /** Resolves once the peripheral acknowledges the write. */
  writeCharacteristic(characteristicId: string, data: Uint8Array): Promise<void>;
  /** Resolves once the notification descriptor write is acknowledged. */
  enableNotifications(characteristicId: string): Promise<void>;
  onNotification(listener: NotificationListener): () => void;
  onDisconnect(listener: DisconnectListener): () => void;
  disconnect(): Promise<void>;
}

/** Lowercase, no dashes: `0000FFE4-0000-...` and `0000ffe40000...` compare equal. */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, "").toLowerCase();
}

export function sameUuid(a: string, b: string): boolean {
  return normalizeUuid(a) === normalizeUuid(b);
}
