/**
 * InfluxDB 2.x sink
 *
 * Retries are disabled: a batch that fails is dropped and the next tick
 * starts clean.
 */

import { InfluxDB, Logger, Point, setLogger, WriteApi } from '@influxdata/influxdb-client';
import { createLogger } from '../shared/logger';
import { ISink, WritePoint } from './types';

const logger = createLogger('InfluxSink');

/**
 * The client's own messages, routed into the collector log. ExportPipeline
 * already reports failed writes, so the client's copy is debug only.
 */
export const influxClientLogger: Logger = {
  error(message: string, error?: unknown): void {
    logger.debug(`client: ${message}`, error ?? '');
  },
  warn(message: string, error?: unknown): void {
    logger.warn(`client: ${message}`, error ?? '');
  },
};

export interface InfluxSinkOptions {
  url: string;
  token: string;
  org: string;
  /** Per-request timeout (ms) */
  timeout?: number;
}

export function toPoint(writePoint: WritePoint): Point {
  const point = new Point(writePoint.measurement).timestamp(writePoint.timestamp);

  for (const [key, value] of Object.entries(writePoint.tags)) {
    point.tag(key, value);
  }
  for (const [key, value] of Object.entries(writePoint.intFields)) {
    point.intField(key, value);
  }
  for (const [key, value] of Object.entries(writePoint.floatFields)) {
    point.floatField(key, value);
  }
  return point;
}

export class InfluxSink implements ISink {
  private client: InfluxDB;
  private writeApis = new Map<string, WriteApi>();

  constructor(private options: InfluxSinkOptions) {
    setLogger(influxClientLogger);
    this.client = new InfluxDB({ url: options.url, token: options.token, timeout: options.timeout ?? 10000 });
  }

  async write(bucket: string, points: WritePoint[]): Promise<void> {
    const writeApi = this.getWriteApi(bucket);
    writeApi.writePoints(points.map(toPoint));
    await writeApi.flush();
  }

  async close(): Promise<void> {
    const apis = Array.from(this.writeApis.values());
    this.writeApis.clear();

    const results = await Promise.allSettled(apis.map(api => api.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn('Error closing write API:', result.reason);
      }
    }
  }

  private getWriteApi(bucket: string): WriteApi {
    let writeApi = this.writeApis.get(bucket);
    if (!writeApi) {
      writeApi = this.client.getWriteApi(this.options.org, bucket, 'ms', {
        maxRetries: 0,
        // Flushing is driven by write(); never on the library's own timer
        flushInterval: 0,
        batchSize: 10000,
      });
      this.writeApis.set(bucket, writeApi);
      logger.info(`Write API ready for ${this.options.org}/${bucket} at ${this.options.url}`);
    }
    return writeApi;
  }
}
