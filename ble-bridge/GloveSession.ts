/**
 * Glove Session
 * Owns the link to one glove: discovery, connect + service discovery,
 * notification channels, serialized GATT operations and auto-reconnect.
 *
 * Events:
 *   'stateChanged'   (SessionStateChange)
 *   'linkLost'       (DeviceHandle)
 *   'reconnected'    ({ attempts: number })
 *   'connectionLost' (ConnectionLostError)
 */

import { EventEmitter } from 'events';
import type { ITransport, IPeripheral, ICharacteristic, IService, DiscoveredDevice } from './interfaces/ITransport';
import type { DeviceHandle, DeviceSession, DiscoverOptions, GloveSessionOptions, RestoreHook } from './BleBridgeTypes';
import { BLE_CONFIG, CHANNEL_CONFIG, GATT_CONFIG } from './BleBridgeConstants';
import { GattOperationQueue } from './GattOperationQueue';
import { NotificationChannel, type RawNotification } from './NotificationChannel';
import { bleLogger } from './BleLogger';
import { SessionStateMachine } from '../ble-management/SessionStateMachine';
import { ReconnectionManager } from '../ble-management/ReconnectionManager';
import { DisconnectReason, SESSION_CONFIG, SessionState, type SessionStateChange } from '../ble-management/types';
import { GLOVE_CHARACTERISTICS, GLOVE_SERVICES, serviceUuids, normalizeUuid } from '../glove-protocol/GattProfile';
import type { CharacteristicKey } from '../glove-protocol/types';
import {
  ConnectTimeoutError,
  ConnectionLostError,
  DeviceUnreachableError,
  GattTimeoutError,
  GloveError,
  OperationCancelledError,
  WriteRejectedError,
  describeError,
} from '../shared/errors';
import { cancellableDelay, delay, monotonicClock, withAbort, withTimeout } from '../shared/clock';
import { createLogger } from '../shared/Logger';

const log = createLogger('GloveSession');

const DEFAULT_OPTIONS: GloveSessionOptions = {
  scanTimeoutMs: BLE_CONFIG.SCAN_TIMEOUT,
  connectTimeoutMs: BLE_CONFIG.CONNECTION_TIMEOUT,
  channelCapacity: CHANNEL_CONFIG.CAPACITY,
  operationTimeoutMs: GATT_CONFIG.OPERATION_TIMEOUT,
  cancelGraceMs: SESSION_CONFIG.cancelGraceMs,
  reconnect: SESSION_CONFIG.reconnect,
  clock: monotonicClock,
};

interface Subscription {
  channel: NotificationChannel<RawNotification>;
  listener: ((data: Buffer) => void) | null;
  handle: ICharacteristic | null;
}

interface ConnectPlan {
  /** Run restore hooks and re-enable subscriptions before READY */
  restore: boolean;
  /** State to fall back to when the attempt fails */
  failureState: SessionState.DISCOVERED | SessionState.RECONNECTING;
}

export class GloveSession extends EventEmitter {
  private readonly options: GloveSessionOptions;
  private readonly machine = new SessionStateMachine();
  private readonly queue = new GattOperationQueue('glove');
  private readonly reconnection: ReconnectionManager;

  private device: DeviceHandle | null = null;
  private peripheral: IPeripheral | null = null;
  private handles = new Map<CharacteristicKey, ICharacteristic>();
  private subscriptions = new Map<CharacteristicKey, Subscription>();
  private restoreHooks: RestoreHook[] = [];

  private operationAbort: AbortController | null = null;
  private pendingOperation: Promise<unknown> | null = null;
  private connectAttempt = 0;
  private intentionalDisconnect = false;

  constructor(private readonly transport: ITransport, options: Partial<GloveSessionOptions> = {}) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };

    this.machine.on('stateChanged', (change: SessionStateChange) => {
      log.debug(`State ${change.previousState} → ${change.newState}`);
      this.emit('stateChanged', change);
    });

    this.reconnection = new ReconnectionManager({
      deviceName: 'glove',
      schedule: this.options.reconnect,
      connect: () => this.attemptAutoReconnect(),
      onReconnected: attempts => this.emit('reconnected', { attempts }),
      onExhausted: attempts => this.handleReconnectExhausted(attempts),
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // State
  // ───────────────────────────────────────────────────────────────────────────

  getState(): SessionState {
    return this.machine.getState();
  }

  isReady(): boolean {
    return this.machine.getState() === SessionState.READY;
  }

  getDevice(): DeviceHandle | null {
    return this.device ? { ...this.device, rssi: this.peripheral?.rssi ?? this.device.rssi } : null;
  }

  getSnapshot(): DeviceSession {
    const device = this.getDevice();
    return {
      id: device?.id ?? null,
      name: device?.name ?? null,
      address: device?.address ?? null,
      rssi: device?.rssi ?? null,
      state: this.machine.getState(),
      characteristics: Array.from(this.handles.keys()),
      subscriptions: Array.from(this.subscriptions.keys()),
      reconnectAttempts: this.reconnection.getState()?.attempts ?? 0,
    };
  }

  hasCharacteristic(key: CharacteristicKey): boolean {
    return this.handles.has(key);
  }

  /**
   * Register a hook run after every reconnect, before notifications resume.
   * @returns unregister function
   */
  addRestoreHook(hook: RestoreHook): () => void {
    this.restoreHooks.push(hook);
    return () => {
      this.restoreHooks = this.restoreHooks.filter(h => h !== hook);
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Discovery
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Scan for gloves matching the name pattern and RSSI floor.
   * Cancelled by disconnect() with OperationCancelledError.
   */
  async discover(options: DiscoverOptions = {}): Promise<DeviceHandle[]> {
    const timeoutMs = options.timeoutMs ?? this.options.scanTimeoutMs;

    this.machine.transition(SessionState.SCANNING, { timeoutMs });
    const signal = this.beginOperation();

    const run = async (): Promise<DeviceHandle[]> => {
      await this.ensureTransport();

      let markFound: () => void = () => undefined;
      const found = new Promise<void>(resolve => {
        markFound = resolve;
      });
      const onDiscovered = (device: DiscoveredDevice) => {
        if (options.address && device.address.toLowerCase() === options.address.toLowerCase()) {
          markFound();
        }
      };
      this.transport.on('deviceDiscovered', onDiscovered);

      const windowAbort = new AbortController();
      try {
        await this.transport.startScan();
        // Transports announce a peripheral only the first time they see it
        this.transport.getDiscoveredDevices().forEach(onDiscovered);
        const scanWindow = cancellableDelay(timeoutMs, windowAbort.signal, () => new OperationCancelledError('scan window'))
          .catch(() => undefined);
        await withAbort(Promise.race([scanWindow, found]), signal, () => new OperationCancelledError('discover'));
      } finally {
        windowAbort.abort();
        this.transport.removeListener('deviceDiscovered', onDiscovered);
        await this.transport.stopScan();
      }

      return this.transport
        .getDiscoveredDevices()
        .map(device => ({ ...device }))
        .sort((a, b) => b.rssi - a.rssi);
    };

    try {
      const devices = await this.track(run());
      log.info(`🔍 Discovery found ${devices.length} glove(s)`);
      this.machine.transition(devices.length > 0 ? SessionState.DISCOVERED : SessionState.IDLE, {
        found: devices.length,
      });
      return devices;
    } catch (error) {
      if (this.machine.getState() === SessionState.SCANNING) {
        this.machine.transition(SessionState.IDLE, { error: describeError(error) });
      }
      throw error;
    } finally {
      this.endOperation(signal);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Connection
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Connect and discover the glove's services within the connect timeout.
   * Rejects with ConnectTimeoutError, DeviceUnreachableError or OperationCancelledError.
   */
  async connect(handle: DeviceHandle): Promise<DeviceSession> {
    this.reconnection.cleanup();
    this.device = { ...handle };
    await this.connectWith(handle, { restore: false, failureState: SessionState.DISCOVERED });
    return this.getSnapshot();
  }

  /**
   * Manual reconnect: always re-enters SCANNING for the last device address, then connects.
   */
  async reconnect(): Promise<DeviceSession> {
    const device = this.device;
    if (!device) {
      throw new DeviceUnreachableError('unknown', 'no previous device to reconnect to');
    }

    this.reconnection.cleanup();

    if (this.machine.getState() === SessionState.READY) {
      this.releaseLinkResources(new OperationCancelledError('GATT operation (reconnect)'));
      await this.dropLink();
      this.machine.transition(SessionState.DISCONNECTED, { reason: 'manual reconnect' });
    }

    const devices = await this.discover({ address: device.address });
    const match = devices.find(d => d.address.toLowerCase() === device.address.toLowerCase());
    if (!match) {
      if (this.machine.getState() === SessionState.DISCOVERED) {
        this.machine.transition(SessionState.IDLE, { reason: 'device not found' });
      }
      throw new DeviceUnreachableError(device.address, 'not found during reconnect scan');
    }

    this.device = { ...match };
    await this.connectWith(match, { restore: true, failureState: SessionState.DISCOVERED });
    return this.getSnapshot();
  }

  private async connectWith(handle: DeviceHandle, plan: ConnectPlan): Promise<void> {
    this.machine.transition(SessionState.CONNECTING, { deviceId: handle.id });
    const signal = this.beginOperation();
    const attempt = ++this.connectAttempt;

    try {
      await this.track(
        withTimeout(
          withAbort(this.establish(handle, plan, attempt), signal, () => new OperationCancelledError('connect')),
          this.options.connectTimeoutMs,
          () => new ConnectTimeoutError(handle.id, this.options.connectTimeoutMs)
        )
      );
    } catch (error) {
      // Any late step of the abandoned attempt becomes a no-op
      if (attempt === this.connectAttempt) this.connectAttempt++;
      bleLogger.logConnectionError(handle.id, handle.name, 'connect', error);

      if (!(error instanceof OperationCancelledError)) {
        await this.dropLink();
        if (this.machine.is(SessionState.CONNECTING, SessionState.SERVICE_DISCOVERY)) {
          this.machine.transition(plan.failureState, { error: describeError(error) });
        }
      }
      throw error instanceof GloveError
        ? error
        : new DeviceUnreachableError(handle.id, describeError(error), { cause: error });
    } finally {
      this.endOperation(signal);
    }
  }

  private async establish(handle: DeviceHandle, plan: ConnectPlan, attempt: number): Promise<void> {
    const checkCurrent = () => {
      if (attempt !== this.connectAttempt) throw new OperationCancelledError('connect');
    };

    const peripheral = this.transport.getPeripheral(handle.id);
    if (!peripheral) {
      throw new DeviceUnreachableError(handle.id, 'not in the transport cache; discover first');
    }

    bleLogger.logConnection(handle.id, handle.name, 'connecting');
    try {
      await peripheral.connect();
    } catch (error) {
      throw new DeviceUnreachableError(handle.id, describeError(error), { cause: error });
    }

    // Abandoned attempt: the late link is not kept
    if (attempt !== this.connectAttempt) {
      await peripheral.disconnect().catch((error: unknown) => {
        log.warn(`Dropping stale link failed: ${describeError(error)}`);
      });
      throw new OperationCancelledError('connect');
    }

    this.peripheral = peripheral;
    peripheral.removeListener('disconnect', this.onPeripheralDisconnect);
    peripheral.on('disconnect', this.onPeripheralDisconnect);

    this.machine.transition(SessionState.SERVICE_DISCOVERY);
    const services = await peripheral.discoverServices(serviceUuids());
    checkCurrent();

    this.handles = await this.mapCharacteristics(handle, services);
    checkCurrent();

    if (plan.restore) {
      await this.runRestoreHooks();
      checkCurrent();
      await this.resubscribeAll();
      checkCurrent();
    }

    this.machine.transition(SessionState.READY, { deviceId: handle.id });
    bleLogger.logConnection(handle.id, handle.name, '✅ ready', { characteristics: this.handles.size });
  }

  private async mapCharacteristics(
    handle: DeviceHandle,
    services: IService[]
  ): Promise<Map<CharacteristicKey, ICharacteristic>> {
    const found = new Map<string, ICharacteristic>();
    for (const service of services) {
      const serviceUuid = normalizeUuid(service.uuid);
      const characteristics = await service.discoverCharacteristics();
      characteristics.forEach(c => found.set(`${serviceUuid}/${normalizeUuid(c.uuid)}`, c));
    }

    const handles = new Map<CharacteristicKey, ICharacteristic>();
    const missing: CharacteristicKey[] = [];

    for (const def of GLOVE_CHARACTERISTICS) {
      const characteristic = found.get(`${GLOVE_SERVICES[def.service]}/${def.uuid}`);
      if (characteristic) {
        handles.set(def.key, characteristic);
      } else if (def.required) {
        missing.push(def.key);
      }
    }

    if (missing.length > 0) {
      throw new DeviceUnreachableError(handle.id, `missing required characteristics: ${missing.join(', ')}`);
    }

    return handles;
  }

  private async runRestoreHooks(): Promise<void> {
    for (const hook of this.restoreHooks) {
      await hook();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Link loss & auto-reconnect
  // ───────────────────────────────────────────────────────────────────────────

  private readonly onPeripheralDisconnect = () => {
    if (this.intentionalDisconnect) return;
    if (this.machine.getState() !== SessionState.READY) return;

    const device = this.device;
    log.warn(`⚠️ Link lost to ${device?.name ?? 'glove'}`);

    this.releaseLinkResources(new OperationCancelledError('GATT operation (link lost)'));
    this.machine.transition(SessionState.DISCONNECTED, { reason: DisconnectReason.CONNECTION_LOST });
    if (device) this.emit('linkLost', { ...device });

    this.machine.transition(SessionState.RECONNECTING);
    this.reconnection.scheduleReconnect(DisconnectReason.CONNECTION_LOST);
  };

  private async attemptAutoReconnect(): Promise<boolean> {
    const device = this.device;
    if (!device || this.machine.getState() !== SessionState.RECONNECTING) return false;

    try {
      await this.connectWith(device, { restore: true, failureState: SessionState.RECONNECTING });
      return true;
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      return false;
    }
  }

  private handleReconnectExhausted(attempts: number): void {
    const device = this.device;
    const error = new ConnectionLostError(device?.address ?? 'unknown', attempts);
    log.error(`❌ ${error.message}`);

    this.closeSubscriptions();
    if (this.machine.getState() !== SessionState.IDLE) {
      this.machine.transition(SessionState.IDLE, { reason: 'reconnect exhausted' });
    }
    this.emit('connectionLost', error);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Notifications
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Enable notifications on a characteristic; payloads land in a bounded channel.
   * The same channel keeps receiving after an auto-reconnect.
   */
  async subscribe(key: CharacteristicKey): Promise<NotificationChannel<RawNotification>> {
    this.requireReady(`subscribe ${key}`);

    const existing = this.subscriptions.get(key);
    if (existing) return existing.channel;

    const subscription: Subscription = {
      channel: new NotificationChannel<RawNotification>(key, this.options.channelCapacity),
      listener: null,
      handle: null,
    };
    this.subscriptions.set(key, subscription);

    try {
      await this.enableNotifications(key, subscription);
    } catch (error) {
      this.subscriptions.delete(key);
      subscription.channel.close();
      throw error;
    }

    log.info(`📡 Subscribed to ${key}`);
    return subscription.channel;
  }

  async unsubscribe(key: CharacteristicKey): Promise<void> {
    const subscription = this.subscriptions.get(key);
    if (!subscription) return;

    this.subscriptions.delete(key);
    this.detachListener(subscription);
    subscription.channel.close();

    const handle = this.handles.get(key);
    if (handle && this.isReady()) {
      await this.queue.enqueue(`unsubscribe_${key}`, () => handle.unsubscribe(), {
        timeoutMs: this.options.operationTimeoutMs,
      });
    }
  }

  private async enableNotifications(key: CharacteristicKey, subscription: Subscription): Promise<void> {
    const handle = this.handles.get(key);
    if (!handle) {
      throw new DeviceUnreachableError(this.device?.id ?? 'unknown', `characteristic ${key} not available`);
    }

    this.detachListener(subscription);
    const { channel } = subscription;
    const listener = (data: Buffer) => {
      channel.push({ key, payload: data, hostMs: this.options.clock() });
    };
    handle.on('data', listener);
    subscription.listener = listener;
    subscription.handle = handle;

    await this.queue.enqueue(`subscribe_${key}`, () => this.subscribeWithRetry(key, handle), {
      timeoutMs: this.options.operationTimeoutMs * GATT_CONFIG.SUBSCRIBE_RETRIES,
    });
  }

  private async subscribeWithRetry(key: CharacteristicKey, handle: ICharacteristic): Promise<void> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= GATT_CONFIG.SUBSCRIBE_RETRIES; attempt++) {
      try {
        await handle.subscribe();
        return;
      } catch (error) {
        lastError = error;
        log.warn(`Subscribe ${key} attempt ${attempt} failed: ${describeError(error)}`);
        await delay(GATT_CONFIG.SUBSCRIBE_RETRY_DELAY);
      }
    }
    throw lastError;
  }

  private async resubscribeAll(): Promise<void> {
    for (const [key, subscription] of this.subscriptions) {
      await this.enableNotifications(key, subscription);
    }
  }

  private detachListener(subscription: Subscription): void {
    if (subscription.handle && subscription.listener) {
      subscription.handle.removeListener('data', subscription.listener);
    }
    subscription.handle = null;
    subscription.listener = null;
  }

  private closeSubscriptions(): void {
    for (const subscription of this.subscriptions.values()) {
      this.detachListener(subscription);
      subscription.channel.close();
    }
    this.subscriptions.clear();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // GATT operations
  // ───────────────────────────────────────────────────────────────────────────

  async read(key: CharacteristicKey): Promise<Buffer> {
    const handle = this.requireHandle(key);
    return this.queue.enqueue(`read_${key}`, () => handle.read(), {
      timeoutMs: this.options.operationTimeoutMs,
    });
  }

  /**
   * Write with response, then read back; the read-back bytes are the device's acknowledgment.
   */
  async writeConfig(key: CharacteristicKey, data: Buffer): Promise<Buffer> {
    const handle = this.requireHandle(key);
    const timeoutMs = this.options.operationTimeoutMs;

    try {
      return await this.queue.enqueue(
        `write_${key}`,
        async () => {
          try {
            await handle.write(data, true);
          } catch (error) {
            throw new WriteRejectedError(key, describeError(error), { cause: error });
          }
          return handle.read();
        },
        { priority: 2, timeoutMs }
      );
    } catch (error) {
      if (error instanceof GattTimeoutError) {
        throw new WriteRejectedError(key, `no acknowledgment within ${timeoutMs}ms`, { cause: error });
      }
      throw error;
    }
  }

  private requireHandle(key: CharacteristicKey): ICharacteristic {
    // Restore hooks run during SERVICE_DISCOVERY, before READY
    if (!this.machine.is(SessionState.READY, SessionState.SERVICE_DISCOVERY)) {
      throw new DeviceUnreachableError(this.device?.id ?? 'unknown', `not connected (state: ${this.getState()})`);
    }
    const handle = this.handles.get(key);
    if (!handle) {
      throw new DeviceUnreachableError(this.device?.id ?? 'unknown', `characteristic ${key} not available`);
    }
    return handle;
  }

  private requireReady(operation: string): void {
    if (!this.isReady()) {
      throw new DeviceUnreachableError(
        this.device?.id ?? 'unknown',
        `${operation} requires a ready session (state: ${this.getState()})`
      );
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Teardown
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * User-initiated disconnect: cancels pending discover/connect and reconnects,
   * releases every subscription and returns to IDLE.
   */
  async disconnect(): Promise<void> {
    log.info('🛑 Disconnect requested');
    this.intentionalDisconnect = true;

    try {
      this.reconnection.cleanup();
      this.connectAttempt++;

      const pending = this.pendingOperation;
      this.operationAbort?.abort();
      if (pending) await this.waitForGrace(pending);

      this.closeSubscriptions();
      this.releaseLinkResources(new OperationCancelledError('GATT operation (disconnect)'));

      if (this.transport.isScanning) await this.transport.stopScan();
      await this.dropLink();

      this.machine.reset({ reason: DisconnectReason.USER_REQUESTED });
    } finally {
      this.intentionalDisconnect = false;
    }
  }

  /**
   * Disconnect and release the transport.
   */
  async dispose(): Promise<void> {
    await this.disconnect();
    await this.transport.cleanup();
    this.removeAllListeners();
  }

  private async waitForGrace(pending: Promise<unknown>): Promise<void> {
    const graceAbort = new AbortController();
    const grace = cancellableDelay(this.options.cancelGraceMs, graceAbort.signal, () => new OperationCancelledError('grace'));
    await Promise.race([pending.then(() => undefined, () => undefined), grace.catch(() => undefined)]);
    graceAbort.abort();
  }

  private releaseLinkResources(reason: OperationCancelledError): void {
    this.queue.cancelAll(() => reason);
    this.handles = new Map();
    for (const subscription of this.subscriptions.values()) {
      this.detachListener(subscription);
    }
  }

  private async dropLink(): Promise<void> {
    const peripheral = this.peripheral;
    if (!peripheral) return;

    const wasIntentional = this.intentionalDisconnect;
    this.intentionalDisconnect = true;
    try {
      peripheral.removeListener('disconnect', this.onPeripheralDisconnect);
      await peripheral.disconnect();
    } catch (error) {
      log.warn(`Peripheral disconnect failed: ${describeError(error)}`);
    } finally {
      this.intentionalDisconnect = wasIntentional;
      this.peripheral = null;
      this.handles = new Map();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────────

  private async ensureTransport(): Promise<void> {
    if (this.transport.isInitialized) return;

    const ready = await this.transport.initialize();
    if (!ready) {
      throw new DeviceUnreachableError('adapter', 'Bluetooth adapter unavailable');
    }
  }

  private beginOperation(): AbortSignal {
    this.operationAbort?.abort();
    this.operationAbort = new AbortController();
    return this.operationAbort.signal;
  }

  private endOperation(signal: AbortSignal): void {
    if (this.operationAbort?.signal === signal) {
      this.operationAbort = null;
      this.pendingOperation = null;
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.pendingOperation = promise;
    return promise;
  }
}
