/**
 * Collector Configuration Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, loadConfig, parseConfig, resolveConfigPath } from './CollectorConfig';

const BASE = {
  bucket: 'sensors',
  measurement: 'ruuvi',
  host: 'http://localhost:8086',
  org: 'home',
  token: 'test-secret',
  tags: { kitchen: 'aa:bb:cc:dd:ee:01', garage: 'AA-BB-CC-DD-EE-02' },
  interval: 10,
};

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('parseConfig', () => {
  it('fills in defaults and converts seconds to milliseconds', () => {
    const config = parseConfig(BASE, {});

    expect(config.sink).toEqual({
      url: 'http://localhost:8086',
      org: 'home',
      token: 'test-secret',
      bucket: 'sensors',
      measurement: 'ruuvi',
    });
    expect(config.devices).toEqual({ kitchen: 'AA:BB:CC:DD:EE:01', garage: 'AA:BB:CC:DD:EE:02' });
    expect(config.polling).toEqual({
      intervalMs: 10000,
      readTimeoutMs: 5000,
      maxConcurrentReads: 4,
      maxConsecutiveReadFailures: 5,
    });
    expect(config.discovery).toEqual({
      namePattern: 'Ruuvi',
      scanWindowMs: 5000,
      retryDelayMs: 1000,
      retryBackoffMultiplier: 1,
      maxRetryDelayMs: 30000,
      startupTimeoutMs: 0,
      reconcileIntervalMs: 10000,
    });
    expect(config.transport).toBe('auto');
    expect(config.statusEvery).toBe(6);
  });

  it('accepts fractional seconds and explicit options', () => {
    const config = parseConfig(
      { ...BASE, interval: 0.5, readTimeout: 2.5, startupTimeout: 60, transport: 'mock', statusEvery: 0 },
      {}
    );

    expect(config.polling.intervalMs).toBe(500);
    expect(config.polling.readTimeoutMs).toBe(2500);
    expect(config.discovery.startupTimeoutMs).toBe(60000);
    expect(config.transport).toBe('mock');
    expect(config.statusEvery).toBe(0);
  });

  it('lets the environment override sink settings', () => {
    const { token: _token, ...withoutToken } = BASE;

    const config = parseConfig(withoutToken, {
      INFLUX_TOKEN: 'env-secret',
      INFLUX_BUCKET: 'other-bucket',
      INFLUX_HOST: 'http://influx.local:8086',
      INFLUX_ORG: '',
    });

    expect(config.sink.token).toBe('env-secret');
    expect(config.sink.bucket).toBe('other-bucket');
    expect(config.sink.url).toBe('http://influx.local:8086');
    expect(config.sink.org).toBe('home');
  });

  it('rejects an invalid hardware address', () => {
    const error = configErrorOf(() => parseConfig({ ...BASE, tags: { kitchen: 'not-an-address' } }, {}));

    expect(error.kind).toBe('Invalid');
    expect(error.issues).toEqual(['tags.kitchen: Invalid hardware address "not-an-address"']);
  });

  it('rejects an address assigned to two devices', () => {
    const error = configErrorOf(() =>
      parseConfig({ ...BASE, tags: { kitchen: 'AA:BB:CC:DD:EE:01', pantry: 'aa:bb:cc:dd:ee:01' } }, {})
    );

    expect(error.issues).toEqual(['tags.pantry: Address AA:BB:CC:DD:EE:01 is already assigned to kitchen']);
  });

  it('rejects an empty device list', () => {
    const error = configErrorOf(() => parseConfig({ ...BASE, tags: {} }, {}));

    expect(error.issues).toEqual(['tags: At least one device is required']);
  });

  it.each([0, -5])('rejects an interval of %p', interval => {
    const error = configErrorOf(() => parseConfig({ ...BASE, interval }, {}));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^interval: /);
  });

  it('rejects a retry cap shorter than the retry delay', () => {
    const error = configErrorOf(() => parseConfig({ ...BASE, retryDelay: 5, maxRetryDelay: 2 }, {}));

    expect(error.issues).toEqual(['maxRetryDelay: Must not be shorter than retryDelay']);
  });

  it('rejects an unknown transport', () => {
    const error = configErrorOf(() => parseConfig({ ...BASE, transport: 'serial' }, {}));

    expect(error.issues[0]).toMatch(/^transport: /);
  });

  it('reports missing fields', () => {
    const { bucket: _bucket, ...withoutBucket } = BASE;

    const error = configErrorOf(() => parseConfig(withoutBucket, {}));

    expect(error.issues).toEqual(['bucket: Required']);
  });

  it('rejects a document that is not an object', () => {
    const error = configErrorOf(() => parseConfig([BASE], {}));

    expect(error.message).toBe('Configuration must be a JSON object');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'collector-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads and validates a file', () => {
    const file = path.join(dir, 'collector.json');
    fs.writeFileSync(file, JSON.stringify(BASE));

    expect(loadConfig(file, {}).devices.kitchen).toBe('AA:BB:CC:DD:EE:01');
  });

  it('reports a missing file as unreadable', () => {
    const error = configErrorOf(() => loadConfig(path.join(dir, 'missing.json'), {}));

    expect(error.kind).toBe('Unreadable');
  });

  it('reports malformed JSON as invalid', () => {
    const file = path.join(dir, 'collector.json');
    fs.writeFileSync(file, '{ "bucket": ');

    const error = configErrorOf(() => loadConfig(file, {}));

    expect(error.kind).toBe('Invalid');
    expect(error.message).toMatch(/is not valid JSON/);
  });
});

describe('resolveConfigPath', () => {
  it('prefers the command line argument', () => {
    expect(resolveConfigPath(['site.json'], { COLLECTOR_CONFIG: '/etc/collector.json' }, '/srv')).toBe(
      '/srv/site.json'
    );
  });

  it('falls back to COLLECTOR_CONFIG', () => {
    expect(resolveConfigPath([], { COLLECTOR_CONFIG: '/etc/collector.json' }, '/srv')).toBe('/etc/collector.json');
  });

  it('defaults to collector.json in the working directory', () => {
    expect(resolveConfigPath([], {}, '/srv')).toBe('/srv/collector.json');
  });
});
