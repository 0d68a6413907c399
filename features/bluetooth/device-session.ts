/**
 * Device Session
 *
 * Drives the WT901 configuration handshake over a `SensorTransport` and, once
 * streaming, pipes every notification payload through the frame decoder into
 * the kick detector.
 *
 *   disconnected → discovering → unlocking → settingRate → savingConfig
 *     → enablingNotifications → streaming
 *
 * Each state advances only when the transport acknowledges the operation it
 * started. Failures and disconnects return to "disconnected"; steps are never
 * retried individually; call `start()` again to rerun the whole sequence.
 */

import { SessionConfig, Wt901Commands, Wt901Gatt } from "@/constants/device";
import { decodeFrames } from "@/features/signal-processing";
import type { KickDetector, KickListener, ThresholdConfig } from "@/features/kick-detection";
import type { SensorSample } from "@/features/signal-processing";
import { createLogger, type Logger } from "@/lib/logger";
import { ConfigurationError, TransportError, toErrorInfo } from "./errors";
import { normalizeUuid, sameUuid, type GattServiceInfo, type SensorTransport } from "./transport";
import type {
  DeviceSessionEvent,
  DeviceSessionListener,
  SensorCharacteristics,
  SessionState,
  SessionStats,
} from "./types";

export interface DeviceSessionOptions {
  /** Acknowledgment timeout per write/descriptor step. `null` waits forever. */
  stepTimeoutMs?: number | null;
  logger?: Logger;
}

type HandshakeStep = Exclude<SessionState, "disconnected" | "discovering" | "streaming">;

// ============================================================================
// CHARACTERISTIC LOCATION
// ============================================================================

function holdsSensorPair(service: GattServiceInfo): boolean {
  const has = (uuid: string) => service.characteristicIds.some((id) => sameUuid(id, uuid));
  return has(Wt901Gatt.NOTIFY_CHAR_UUID) && has(Wt901Gatt.WRITE_CHAR_UUID);
}

/**
 * Find the notify/write pair. The expected service wins; otherwise every
 * advertised service is probed, since the WT901BLE may expose the pair under
 * a different service. Returned ids are the transport's own spelling.
 */
export function locateCharacteristics(
  services: readonly GattServiceInfo[],
): SensorCharacteristics | null {
  const expected = services.find(
    (s) => sameUuid(s.uuid, Wt901Gatt.SERVICE_UUID) && holdsSensorPair(s),
  );
  const service = expected ?? services.find(holdsSensorPair);
  if (!service) return null;

  const pick = (uuid: string) => service.characteristicIds.find((id) => sameUuid(id, uuid));
  const notifyId = pick(Wt901Gatt.NOTIFY_CHAR_UUID);
  const writeId = pick(Wt901Gatt.WRITE_CHAR_UUID);
  if (notifyId === undefined || writeId === undefined) return null;
  return { serviceUuid: service.uuid, notifyId, writeId };
}

// ============================================================================
// DEVICE SESSION
// ============================================================================

export class DeviceSession {
  private state: SessionState = "disconnected";
  private characteristics: SensorCharacteristics | null = null;
  private listeners = new Set<DeviceSessionListener>();
  private stats: SessionStats = { payloadsReceived: 0, samplesDecoded: 0, kicksDetected: 0 };

  // Bumped on every start, failure and disconnect; stale continuations check it.
  private attempt = 0;
  private inFlight: Promise<void> | null = null;
  private abortPendingStep: ((reason: Error) => void) | null = null;
  private cancelReason: TransportError | null = null;
  private needsDetectorReset = false;

  private readonly stepTimeoutMs: number | null;
  private readonly logger: Logger;
  private readonly unsubscribers: Array<() => void>;

  constructor(
    private readonly transport: SensorTransport,
    private readonly detector: KickDetector,
    options: DeviceSessionOptions = {},
  ) {
    this.stepTimeoutMs =
      options.stepTimeoutMs === undefined ? SessionConfig.STEP_ACK_TIMEOUT_MS : options.stepTimeoutMs;
    this.logger = options.logger ?? createLogger("Session");
    this.unsubscribers = [
      transport.onNotification((id, payload) => this.handleNotification(id, payload)),
      transport.onDisconnect((reason) => this.handleDisconnect(reason)),
    ];
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): SessionState {
    return this.state;
  }

  isStreaming(): boolean {
    return this.state === "streaming";
  }

  getCharacteristics(): SensorCharacteristics | null {
    return this.characteristics;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  addEventListener(listener: DeviceSessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onKick(listener: KickListener): () => void {
    return this.addEventListener((e) => {
      if (e.type === "kick") listener(e.event);
    });
  }

  onSample(listener: (sample: SensorSample) => void): () => void {
    return this.addEventListener((e) => {
      if (e.type === "sample") listener(e.sample);
    });
  }

  setThresholds(upper: number, lower: number): ThresholdConfig {
    return this.detector.setThresholds(upper, lower);
  }

  reset(): void {
    this.detector.reset();
  }

  private emit(event: DeviceSessionEvent): void {
    this.listeners.forEach((fn) => {
      try {
        fn(event);
      } catch (e) {
        this.logger.error("Event listener error:", e);
      }
    });
  }

  // ============================================================================
  // HANDSHAKE
  // ============================================================================

  /**
   * Run the handshake. Resolves on entering "streaming"; rejects with a
   * `TransportError` or `ConfigurationError`, which is also emitted once as an
   * "error" event. Calling while a handshake is running returns that run.
   */
  start(): Promise<void> {
    if (this.state === "streaming") return Promise.resolve();
    if (this.inFlight) return this.inFlight;

    const attempt = ++this.attempt;
    this.cancelReason = null;
    const run = this.runHandshake(attempt).finally(() => {
      if (this.inFlight === run) this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async runHandshake(attempt: number): Promise<void> {
    try {
      this.transition("discovering");
      const services = await this.guard(attempt, "discovering", null, () =>
        this.transport.discoverServices(),
      ).catch((err: unknown) => {
        throw err instanceof TransportError
          ? err
          : new TransportError("DISCOVERY_FAILED", "Service discovery failed", { cause: err });
      });

      this.ensureActive(attempt);
      const found = locateCharacteristics(services);
      if (!found) {
        throw ConfigurationError.characteristicsNotFound(services.map((s) => s.uuid));
      }
      this.characteristics = found;
      this.logger.debug(
        `Characteristics in ${found.serviceUuid}: notify=${found.notifyId}, write=${found.writeId}`,
      );

      await this.step(attempt, "unlocking", () =>
        this.transport.writeCharacteristic(found.writeId, Uint8Array.from(Wt901Commands.UNLOCK)),
      );
      await this.step(attempt, "settingRate", () =>
        this.transport.writeCharacteristic(found.writeId, Uint8Array.from(Wt901Commands.SET_RATE_100HZ)),
      );
      await this.step(attempt, "savingConfig", () =>
        this.transport.writeCharacteristic(found.writeId, Uint8Array.from(Wt901Commands.SAVE_CONFIG)),
      );
      await this.step(attempt, "enablingNotifications", () =>
        this.transport.enableNotifications(found.notifyId),
      );

      this.ensureActive(attempt);
      this.enterStreaming();
    } catch (err) {
      // Disconnects bump the attempt and report for themselves.
      if (attempt === this.attempt) this.fail(err);
      throw err;
    }
  }

  private async step(
    attempt: number,
    state: HandshakeStep,
    operation: () => Promise<void>,
  ): Promise<void> {
    this.ensureActive(attempt);
    this.transition(state);
    this.logger.debug(`Step ${state}`);
    try {
      await this.guard(attempt, state, this.stepTimeoutMs, operation);
    } catch (err) {
      if (attempt !== this.attempt) throw err;
      throw ConfigurationError.stepFailed(state, err);
    }
  }

  /**
   * Await one transport operation. Rejects early if the session is
   * disconnected meanwhile, or when `timeoutMs` passes without an
   * acknowledgment.
   */
  private guard<T>(
    attempt: number,
    state: SessionState,
    timeoutMs: number | null,
    operation: () => Promise<T>,
  ): Promise<T> {
    if (attempt !== this.attempt) return Promise.reject(this.cancellation());

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        this.abortPendingStep = null;
        finish();
      };

      this.abortPendingStep = (reason) => settle(() => reject(reason));

      if (timeoutMs !== null) {
        timer = setTimeout(() => {
          const code = state === "enablingNotifications" ? "DESCRIPTOR_FAILED" : "WRITE_FAILED";
          settle(() =>
            reject(new TransportError(code, `No acknowledgment within ${timeoutMs} ms`)),
          );
        }, timeoutMs);
      }

      new Promise<T>((run) => run(operation())).then(
        (value) => settle(() => resolve(value)),
        (err: unknown) => settle(() => reject(err)),
      );
    });
  }

  private ensureActive(attempt: number): void {
    if (attempt !== this.attempt) throw this.cancellation();
  }

  private cancellation(): TransportError {
    return this.cancelReason ?? new TransportError("CONNECTION_LOST", "Session is no longer active");
  }

  private enterStreaming(): void {
    if (this.needsDetectorReset) {
      this.detector.reset();
      this.needsDetectorReset = false;
    }
    this.transition("streaming");
    this.logger.info("Streaming");
  }

  // A later start() must begin a new run, even before the old one settles.
  private endAttempt(): void {
    this.attempt++;
    this.inFlight = null;
  }

  private fail(err: unknown): void {
    this.endAttempt();
    this.characteristics = null;
    this.transition("disconnected");
    this.report(err);
  }

  private report(err: unknown): void {
    const error = toErrorInfo(err);
    const cause = err instanceof Error ? err : new Error(String(err));
    this.logger.error(`Error: ${error.code}: ${error.message}`);
    this.emit({ type: "error", error, cause });
  }

  private transition(next: SessionState): void {
    const previousState = this.state;
    if (previousState === next) return;
    this.state = next;
    this.logger.info(`State: ${previousState} -> ${next}`);
    this.emit({ type: "stateChanged", state: next, previousState });
  }

  // ============================================================================
  // TRANSPORT EVENTS
  // ============================================================================

  private handleNotification(characteristicId: string, payload: Uint8Array): void {
    if (this.state !== "streaming" || !this.characteristics) {
      this.logger.debug(`Dropping ${payload.length} bytes received in state ${this.state}`);
      return;
    }
    if (normalizeUuid(characteristicId) !== normalizeUuid(this.characteristics.notifyId)) return;

    this.stats.payloadsReceived++;
    for (const sample of decodeFrames(payload)) {
      this.stats.samplesDecoded++;
      this.emit({ type: "sample", sample });
      const kick = this.detector.process(sample.compensatedMagnitude);
      if (kick) {
        this.stats.kicksDetected++;
        this.emit({ type: "kick", event: kick });
      }
    }
  }

  private handleDisconnect(reason?: string): void {
    const pending = this.abortPendingStep;
    this.needsDetectorReset = true;
    if (this.state === "disconnected" && !pending) return;

    const error = new TransportError(
      "CONNECTION_LOST",
      reason ? `Connection lost: ${reason}` : "Connection lost",
    );
    this.logger.warn(error.message);
    this.endAttempt();
    this.cancelReason = error;
    this.characteristics = null;
    this.transition("disconnected");
    this.report(error);
    pending?.(error);
  }

  // ============================================================================
  // TEARDOWN
  // ============================================================================

  /**
   * Cancel any running handshake and disconnect the transport. A pending
   * `start()` rejects with CONNECTION_LOST; no "error" event is emitted.
   */
  async disconnect(): Promise<void> {
    const pending = this.abortPendingStep;
    const reason = new TransportError("CONNECTION_LOST", "Session disconnected");
    this.endAttempt();
    this.cancelReason = reason;
    this.needsDetectorReset = true;
    this.characteristics = null;
    this.transition("disconnected");
    pending?.(reason);
    await this.transport.disconnect();
  }

  /** Detach from the transport. The session ignores it from then on. */
  dispose(): void {
    this.unsubscribers.forEach((off) => off());
    this.unsubscribers.length = 0;
    this.listeners.clear();
  }
}
