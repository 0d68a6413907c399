import { EventEmitter } from "node:events";
import { vi } from "vitest";
import type { GattCharacteristic, GattPeripheral, GattService } from "../../noble-transport";
import type { BleCentral } from "../../sensor-scanner";

export const NOBLE_SERVICE_UUID = "0000ffe000001000800000805f9a34fb";
export const NOBLE_NOTIFY_UUID = "0000ffe400001000800000805f9a34fb";
export const NOBLE_WRITE_UUID = "0000ffe900001000800000805f9a34fb";

export class FakeCharacteristic extends EventEmitter implements GattCharacteristic {
  writeAsync = vi.fn(async (_data: Buffer, _withoutResponse: boolean) => {});
  subscribeAsync = vi.fn(async () => {});

  constructor(
    readonly uuid: string,
    readonly properties: string[],
  ) {
    super();
  }
}

export class FakePeripheral extends EventEmitter implements GattPeripheral {
  connectAsync = vi.fn(async () => {});
  disconnectAsync = vi.fn(async () => {
    this.emit("disconnect");
  });
  discoverAllServicesAndCharacteristicsAsync = vi.fn(async () => ({
    services: this.services,
    characteristics: this.services.flatMap((s) => [...s.characteristics]),
  }));

  constructor(
    readonly id: string,
    readonly advertisement: { localName?: string },
    readonly rssi: number,
    public services: GattService[] = [],
  ) {
    super();
  }
}

/** A peripheral exposing the WT901 service with its notify and write characteristics. */
export function wt901Peripheral(id = "wt-1") {
  const notify = new FakeCharacteristic(NOBLE_NOTIFY_UUID, ["notify"]);
  const write = new FakeCharacteristic(NOBLE_WRITE_UUID, ["write", "writeWithoutResponse"]);
  const peripheral = new FakePeripheral(id, { localName: "WT901BLE67" }, -52, [
    { uuid: NOBLE_SERVICE_UUID, characteristics: [notify, write] },
  ]);
  return { peripheral, notify, write };
}

export class FakeCentral extends EventEmitter implements BleCentral {
  startScanningAsync = vi.fn(async (_serviceUUIDs?: string[], _allowDuplicates?: boolean) => {});
  stopScanningAsync = vi.fn(async () => {});
}
