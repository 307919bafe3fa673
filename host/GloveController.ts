/**
 * Glove Controller
 *
 * Host-facing surface over one glove: wires the session, telemetry router,
 * calibration, config registry, clock sync, alignment monitor and (while
 * active) the concurrent logger.
 *
 * Events:
 *   'stateChanged'      (SessionStateChange)
 *   'reconnected'       ({ attempts })
 *   'connectionLost'    (ConnectionLostError)
 *   'deviceChanged'     (RegistrySnapshot)
 *   'driftExceeded'     (DriftExceededError)
 *   'driftRestored'     (source)
 *   'alignmentExceeded' (AlignmentExceededEvent)
 *   'streamDegraded'    (source, WriteFailureError)
 */

import { EventEmitter } from 'events';
import type { GloveSession } from '../ble-bridge/GloveSession';
import type { DeviceHandle } from '../ble-bridge/BleBridgeTypes';
import type { SessionState } from '../ble-management/types';
import { CalibrationEngine } from '../calibration/CalibrationEngine';
import { CalibrationStore } from '../calibration/CalibrationStore';
import type { CalibrationOracle, CalibrationProfile, CaptureOptions, DriftReport } from '../calibration/types';
import { fullScaleFor } from '../glove-protocol/SensorTables';
import {
  CommandState,
  SENSOR_SOURCES,
  TELEMETRY_KEYS,
  type CharacteristicKey,
  type DeviceInfo,
  type ImuConfig,
  type ImuId,
  type SensorConfig,
  type SensorConfigChange,
  type SensorSource,
} from '../glove-protocol/types';
import { ConcurrentLogger, type ConcurrentLoggerOptions } from '../recording/ConcurrentLogger';
import type { LoggerSessionInfo, StreamStats, StreamSummary } from '../recording/types';
import { DeviceConfigRegistry, type RegistrySnapshot } from '../registry-management/DeviceConfigRegistry';
import { LoggerStateError, describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import { TelemetryRouter, type RouterStats } from '../telemetry/TelemetryRouter';
import { DeviceClockSync } from '../time-sync/DeviceClockSync';
import { ImuAlignmentMonitor } from '../time-sync/ImuAlignmentMonitor';
import type { AlignmentStats, ClockSyncResult } from '../time-sync/types';
import type { DisplayStatus } from '../websocket-bridge/types/MessageTypes';
import type { GloveConfig } from './config';

const log = createLogger('GloveController');

const METADATA_NOTIFY_KEYS: readonly CharacteristicKey[] = ['batteryCharging', 'overallStatus'];

export interface GloveControllerOptions {
  config: Pick<GloveConfig, 'scanTimeoutMs' | 'logDirectory' | 'subscriberCapacity'> &
    Partial<Pick<GloveConfig, 'calibrationStorePath'>>;
  session: GloveSession;
  router?: TelemetryRouter;
  clockSync?: DeviceClockSync;
  alignment?: ImuAlignmentMonitor;
  /** Options for each logging session's ConcurrentLogger */
  logger?: ConcurrentLoggerOptions;
}

export interface ControllerStats {
  state: SessionState;
  reconnectAttempts: number;
  router: RouterStats;
  logging: StreamStats[];
  alignment: AlignmentStats;
  clock: ClockSyncResult | null;
}

export class GloveController extends EventEmitter {
  readonly session: GloveSession;
  readonly router: TelemetryRouter;
  readonly registry: DeviceConfigRegistry;
  readonly calibration: CalibrationEngine;
  readonly clockSync: DeviceClockSync;
  readonly alignment: ImuAlignmentMonitor;

  private logger: ConcurrentLogger | null = null;
  private stopLoggerFeed: (() => void) | null = null;
  private readonly teardown: Array<() => void> = [];
  private readonly pumps = new Set<Promise<void>>();
  private readonly options: GloveControllerOptions;

  constructor(options: GloveControllerOptions) {
    super();
    this.options = options;
    this.session = options.session;
    this.router = options.router ?? new TelemetryRouter();
    this.clockSync = options.clockSync ?? new DeviceClockSync();
    this.alignment = options.alignment ?? new ImuAlignmentMonitor();
    this.registry = new DeviceConfigRegistry(this.session);

    const storePath = options.config.calibrationStorePath;
    this.calibration = new CalibrationEngine({
      fullScale: source => {
        const config = this.registry.getConfig();
        return config ? fullScaleFor(source, config) : null;
      },
      store: storePath ? new CalibrationStore(storePath) : null,
    });

    this.wire();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Wiring
  // ───────────────────────────────────────────────────────────────────────────

  private wire(): void {
    const capacity = this.options.config.subscriberCapacity;

    this.router.setTransform(frame => this.calibration.process(frame));
    this.teardown.push(
      this.router.subscribe('registry', frame => this.registry.observeFrame(frame), { sources: ['battery'] }),
      this.router.subscribe('alignment', frame => this.alignment.observe(frame), {
        sources: ['imu1', 'imu2'],
        capacity,
      })
    );

    // Restore hooks run in order before notifications resume: config first, then the clock
    this.teardown.push(
      this.session.addRestoreHook(() => this.registry.reapply()),
      this.session.addRestoreHook(() => this.syncClock())
    );

    this.forward(this.session, 'stateChanged');
    this.forward(this.session, 'reconnected');
    this.forward(this.session, 'connectionLost');
    this.forward(this.calibration, 'driftExceeded');
    this.forward(this.calibration, 'driftRestored');
    this.forward(this.alignment, 'alignmentExceeded');
    this.teardown.push(this.registry.onChange(snapshot => this.emit('deviceChanged', snapshot)));

    const onLinkLost = () => this.alignment.reset();
    this.session.on('linkLost', onLinkLost);
    this.teardown.push(() => this.session.off('linkLost', onLinkLost));
  }

  private forward(source: EventEmitter, event: string): void {
    const listener = (...args: unknown[]) => this.emit(event, ...args);
    source.on(event, listener);
    this.teardown.push(() => source.off(event, listener));
  }

  private track(name: string, pump: Promise<void>): void {
    const tracked = pump
      .catch((error: unknown) => log.error(`${name} pump failed: ${describeError(error)}`))
      .finally(() => this.pumps.delete(tracked));
    this.pumps.add(tracked);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Connection
  // ───────────────────────────────────────────────────────────────────────────

  async scan(timeoutMs: number = this.options.config.scanTimeoutMs): Promise<DeviceHandle[]> {
    return this.session.discover({ timeoutMs });
  }

  /**
   * Connect, read device state, set the clock and start the telemetry channels.
   */
  async connect(handle: DeviceHandle): Promise<RegistrySnapshot> {
    await this.session.connect(handle);

    const snapshot = await this.registry.refresh();
    await this.calibration.loadDevice(handle.address.toLowerCase());
    await this.syncClock();

    for (const key of TELEMETRY_KEYS) {
      if (!this.session.hasCharacteristic(key)) continue;
      this.router.attach(await this.session.subscribe(key));
    }
    for (const key of METADATA_NOTIFY_KEYS) {
      if (!this.session.hasCharacteristic(key)) continue;
      this.track(key, this.registry.pump(await this.session.subscribe(key)));
    }

    log.info(`✅ ${handle.name} ready`);
    return snapshot;
  }

  async disconnect(): Promise<void> {
    this.calibration.cancelCaptures();
    if (this.logger) await this.stopLogging();

    await this.session.disconnect();
    await Promise.all(Array.from(this.pumps));
    this.registry.clear();
    this.alignment.reset();
  }

  /**
   * Manual reconnect to the last device; the last acknowledged config is re-applied.
   */
  async reconnect(): Promise<RegistrySnapshot> {
    await this.session.reconnect();
    return this.registry.refresh();
  }

  private async syncClock(): Promise<void> {
    try {
      await this.clockSync.sync(this.session);
    } catch (error) {
      log.warn(`Clock sync failed: ${describeError(error)}`);
    }
  }

  getConnectionState(): SessionState {
    return this.session.getState();
  }

  getDeviceInfo(): DeviceInfo | null {
    return this.registry.getDeviceInfo();
  }

  getSensorConfig(): SensorConfig | null {
    return this.registry.getConfig();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Configuration
  // ───────────────────────────────────────────────────────────────────────────

  async setImuConfig(imu: ImuId, change: Partial<ImuConfig>): Promise<SensorConfig> {
    const request: SensorConfigChange = imu === 'imu1' ? { imu1: change } : { imu2: change };
    return this.registry.requestConfig(request);
  }

  async setUpdateInterval(updateIntervalMs: number): Promise<SensorConfig> {
    return this.registry.requestConfig({ updateIntervalMs });
  }

  async startStreaming(): Promise<SensorConfig> {
    return this.registry.requestConfig({ command: CommandState.RUN });
  }

  async stopStreaming(): Promise<SensorConfig> {
    return this.registry.requestConfig({ command: CommandState.IDLE });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Calibration
  // ───────────────────────────────────────────────────────────────────────────

  async zeroCalibrate(source: SensorSource, options?: CaptureOptions): Promise<CalibrationProfile> {
    return this.calibration.zeroCalibrate(source, options);
  }

  async calibrateWithOracle(
    source: SensorSource,
    oracle: CalibrationOracle,
    options?: CaptureOptions
  ): Promise<CalibrationProfile> {
    return this.calibration.calibrateWithOracle(source, oracle, options);
  }

  async checkDrift(source: SensorSource, options?: CaptureOptions): Promise<DriftReport> {
    return this.calibration.checkDrift(source, options);
  }

  /** Rolling drift check over live frames while the glove is held at rest */
  monitorDrift(source: SensorSource, window?: number): void {
    this.calibration.monitorDrift(source, window);
  }

  stopDriftMonitor(source: SensorSource): void {
    this.calibration.stopDriftMonitor(source);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Logging
  // ───────────────────────────────────────────────────────────────────────────

  isLogging(): boolean {
    return this.logger !== null;
  }

  /**
   * Start a logging session: one file per source under `directory`.
   */
  async startLogging(
    directory: string = this.options.config.logDirectory,
    sources: readonly SensorSource[] = SENSOR_SOURCES
  ): Promise<LoggerSessionInfo> {
    if (this.logger) {
      throw new LoggerStateError('is already running');
    }

    const logger = new ConcurrentLogger(this.options.logger);
    const device = this.session.getDevice();
    const session = await logger.start({
      directory,
      sources,
      device: device ? { address: device.address, name: device.name } : null,
    });

    logger.on('streamDegraded', (...args: unknown[]) => this.emit('streamDegraded', ...args));
    this.logger = logger;
    this.stopLoggerFeed = this.router.subscribe(
      'logger',
      frame => {
        logger.enqueue(frame);
      },
      { sources, capacity: this.options.config.subscriberCapacity }
    );
    return session;
  }

  async stopLogging(): Promise<StreamSummary[]> {
    const logger = this.logger;
    if (!logger) {
      throw new LoggerStateError('is not running');
    }

    this.stopLoggerFeed?.();
    this.stopLoggerFeed = null;
    this.logger = null;

    const summaries = await logger.stop();
    logger.removeAllListeners();
    return summaries;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Status
  // ───────────────────────────────────────────────────────────────────────────

  getStats(): ControllerStats {
    return {
      state: this.session.getState(),
      reconnectAttempts: this.session.getSnapshot().reconnectAttempts,
      router: this.router.getStats(),
      logging: this.logger?.getStats() ?? [],
      alignment: this.alignment.getStats(),
      clock: this.clockSync.getLastResult(),
    };
  }

  /** Snapshot for the display feed */
  getDisplayStatus(): DisplayStatus {
    const { subscribers } = this.router.getStats();
    return {
      connectionState: this.session.getState(),
      device: this.registry.getDeviceInfo(),
      config: this.registry.getConfig(),
      logging: this.isLogging(),
      droppedFrames: Object.values(subscribers).reduce((sum, stats) => sum + stats.dropped, 0),
    };
  }

  async dispose(): Promise<void> {
    this.calibration.cancelCaptures();
    if (this.logger) {
      try {
        await this.stopLogging();
      } catch (error) {
        log.warn(`Stopping the logger failed: ${describeError(error)}`);
      }
    }

    await this.session.dispose();
    await Promise.all(Array.from(this.pumps));
    this.teardown.splice(0).forEach(undo => undo());
    this.router.close();
    this.removeAllListeners();
  }
}
