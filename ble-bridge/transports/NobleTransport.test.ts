/**
 * NobleTransport Tests
 * noble is replaced by an event emitter whose adapter state the tests set
 */

import { NobleTransport } from './NobleTransport';
import { getTransportTiming } from '../PlatformConfig';

const mockAdapter = { state: 'poweredOff' };

jest.mock('@abandonware/noble', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events');
  const noble = new EventEmitter();
  Object.defineProperty(noble, '_state', { get: () => mockAdapter.state });
  return { __esModule: true, default: noble };
});

describe('NobleTransport', () => {
  it('initializes at once when the adapter is already powered on', async () => {
    mockAdapter.state = 'poweredOn';
    const transport = new NobleTransport(getTransportTiming('noble'));

    await expect(transport.initialize()).resolves.toBe(true);
    expect(transport.isInitialized).toBe(true);
  });

  it('reports no adapter when it never powers on', async () => {
    mockAdapter.state = 'poweredOff';
    const transport = new NobleTransport({ ...getTransportTiming('noble'), adapterReadyTimeoutMs: 10 });

    await expect(transport.initialize()).resolves.toBe(false);
    expect(transport.isInitialized).toBe(false);
  });
});
