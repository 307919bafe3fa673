/**
 * BLE Service Factory - transport selector
 *
 * noble: @abandonware/noble (HCI socket), loaded on demand so tools and tests
 *        that never touch an adapter never bind to one
 * mock:  in-process simulated glove
 */

import type { ITransport, TransportConfig } from './interfaces/ITransport';
import type { SimulatedGloveOptions } from './transports/MockGloveTransport';
import { GloveSession } from './GloveSession';
import type { GloveSessionOptions } from './BleBridgeTypes';
import { createLogger } from '../shared/Logger';

const log = createLogger('BleServiceFactory');

export type TransportKind = 'noble' | 'mock';

export interface TransportFactoryOptions {
  filter?: Partial<TransportConfig>;
  mock?: SimulatedGloveOptions;
}

/**
 * Create the transport for the given backend
 */
export async function createTransport(kind: TransportKind, options: TransportFactoryOptions = {}): Promise<ITransport> {
  if (kind === 'mock') {
    log.info('🧪 Using simulated glove transport');
    const { MockGloveTransport } = await import('./transports/MockGloveTransport');
    return new MockGloveTransport(options.mock, options.filter);
  }

  log.info('✅ Using @abandonware/noble (HCI)');
  const { NobleTransport } = await import('./transports/NobleTransport');
  return new NobleTransport(options.filter);
}

/**
 * Create a glove session over a freshly created transport
 */
export async function createGloveSession(
  kind: TransportKind,
  options: TransportFactoryOptions & { session?: Partial<GloveSessionOptions> } = {}
): Promise<GloveSession> {
  const transport = await createTransport(kind, options);
  return new GloveSession(transport, options.session);
}
