import { describe, it, expect, vi, afterEach } from "vitest";
import { SensorScanner } from "../sensor-scanner";
import { TransportError } from "../errors";
import type { SensorScannerEvent } from "../types";
import { FakeCentral, FakePeripheral } from "./helpers/fake-noble";

afterEach(() => {
  vi.useRealTimers();
});

describe("SensorScanner", () => {
  it("keeps WT901 devices and de-duplicates by id", async () => {
    const central = new FakeCentral();
    const scanner = new SensorScanner(central);
    const events: SensorScannerEvent[] = [];
    scanner.addEventListener((e) => events.push(e));

    const sensor = new FakePeripheral("wt-1", { localName: "WT901BLE67" }, -60);
    const result = scanner.scan(60_000);
    central.emit("discover", sensor);
    central.emit("discover", new FakePeripheral("hr-1", { localName: "HeartStrap" }, -40));
    central.emit("discover", new FakePeripheral("anon", {}, -70));
    central.emit("discover", new FakePeripheral("wt-1", { localName: "WT901BLE67" }, -48));
    central.emit("discover", new FakePeripheral("wt-2", { localName: "wt901-left" }, -75));
    scanner.stop();

    expect(await result).toEqual([
      { id: "wt-1", name: "WT901BLE67", rssi: -48 },
      { id: "wt-2", name: "wt901-left", rssi: -75 },
    ]);
    expect(events.filter((e) => e.type === "deviceDiscovered")).toHaveLength(3);
    expect(events.filter((e) => e.type === "scanStateChanged")).toEqual([
      { type: "scanStateChanged", scanning: true },
      { type: "scanStateChanged", scanning: false },
    ]);
    expect(central.startScanningAsync).toHaveBeenCalledWith([], false);
    expect(central.stopScanningAsync).toHaveBeenCalledTimes(1);
    expect(central.listenerCount("discover")).toBe(0);
    expect(scanner.isScanning()).toBe(false);
  });

  it("returns the peripheral behind a discovered device", async () => {
    const central = new FakeCentral();
    const scanner = new SensorScanner(central);
    const sensor = new FakePeripheral("wt-1", { localName: "WT901BLE67" }, -60);

    const result = scanner.scan();
    central.emit("discover", sensor);
    scanner.stop();
    await result;

    expect(scanner.getPeripheral("wt-1")).toBe(sensor);
    expect(scanner.getPeripheral("missing")).toBeUndefined();
  });

  it("accepts a custom name pattern", async () => {
    const central = new FakeCentral();
    const scanner = new SensorScanner(central, { namePattern: "BWT" });
    const result = scanner.scan();
    central.emit("discover", new FakePeripheral("a", { localName: "WT901BLE67" }, -60));
    central.emit("discover", new FakePeripheral("b", { localName: "bwt901cl" }, -60));
    scanner.stop();
    expect((await result).map((d) => d.id)).toEqual(["b"]);
  });

  it("stops after the requested duration", async () => {
    vi.useFakeTimers();
    const central = new FakeCentral();
    const scanner = new SensorScanner(central);

    const result = scanner.scan(5_000);
    await vi.advanceTimersByTimeAsync(4_999);
    expect(scanner.isScanning()).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    expect(await result).toEqual([]);
    expect(scanner.isScanning()).toBe(false);
  });

  it("starts each scan from an empty list", async () => {
    const central = new FakeCentral();
    const scanner = new SensorScanner(central);

    const first = scanner.scan();
    central.emit("discover", new FakePeripheral("wt-1", { localName: "WT901BLE67" }, -60));
    scanner.stop();
    await first;

    const second = scanner.scan();
    scanner.stop();
    expect(await second).toEqual([]);
  });

  it("surfaces a failed scan start as SCAN_FAILED", async () => {
    const central = new FakeCentral();
    const cause = new Error("adapter powered off");
    central.startScanningAsync.mockRejectedValueOnce(cause);
    const scanner = new SensorScanner(central);

    const err = await scanner.scan().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: "SCAN_FAILED", message: "Could not start scanning", cause });
    expect(scanner.isScanning()).toBe(false);
    expect(central.listenerCount("discover")).toBe(0);
  });

  it("rejects a second scan while one is running", async () => {
    const central = new FakeCentral();
    const scanner = new SensorScanner(central);
    const first = scanner.scan();

    await expect(scanner.scan()).rejects.toMatchObject({ code: "SCAN_FAILED" });
    scanner.stop();
    await first;
  });
});
