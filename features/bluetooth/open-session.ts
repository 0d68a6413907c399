import type { KickDetector } from "@/features/kick-detection";
import { createLogger } from "@/lib/logger";
import { DeviceSession, type DeviceSessionOptions } from "./device-session";
import { NobleTransport, type GattPeripheral } from "./noble-transport";

/**
 * Connect to a scanned peripheral, re-arm the detector and run the handshake.
 * On failure the connection is closed again and the handshake error is
 * rethrown.
 */
export async function openSensorSession(
  peripheral: GattPeripheral,
  detector: KickDetector,
  options: DeviceSessionOptions = {},
): Promise<DeviceSession> {
  const logger = options.logger ?? createLogger("Session");
  const transport = new NobleTransport(peripheral, { logger: options.logger });
  await transport.connect();

  const session = new DeviceSession(transport, detector, { ...options, logger });
  // A reused detector may still be disarmed by a reading from the last connection.
  detector.reset();
  try {
    await session.start();
  } catch (err) {
    session.dispose();
    try {
      await transport.disconnect();
    } catch (closeErr) {
      logger.warn("Disconnect after failed handshake failed:", closeErr);
    }
    throw err;
  }
  return session;
}
