/**
 * Metric Sample Collector
 *
 * Turns chunked metric fetches for one gateway into a flat, chronologically
 * ordered table of MetricSample rows.
 */

import {
  MetricFetchError,
  UsageError,
  type Gateway,
  type MetricQuery,
  type MetricSample,
  type MetricSource,
  type RawDatapoint,
  type TimeWindow,
} from '../../types/gateway.js';
import { logger } from '../logger.js';
import { getMetricNames, isCatalogMetric } from './metric-catalog.js';
import { chunkWindow, DEFAULT_MAX_CHUNK_MS } from './window-chunker.js';

export interface CollectorOptions {
  maxChunkMs?: number;
}

export function toMetricSample(gatewayId: string, metricName: string, datapoint: RawDatapoint): MetricSample {
  return {
    gatewayId,
    metricName,
    timestamp: datapoint.timestamp,
    sum: datapoint.sum ?? 0,
    average: datapoint.average ?? 0,
    maximum: datapoint.maximum ?? 0,
    minimum: datapoint.minimum ?? 0,
  };
}

/** Zero-valued stand-in for a metric that never reported for the gateway */
export function placeholderSample(gatewayId: string, metricName: string, timestamp: Date): MetricSample {
  return {
    gatewayId,
    metricName,
    timestamp,
    sum: 0,
    average: 0,
    maximum: 0,
    minimum: 0,
  };
}

/**
 * Collect one metric of one gateway over the whole window.
 *
 * Chunks are fetched one after another in chronological order. The first failing
 * chunk aborts the metric with a MetricFetchError; samples from earlier chunks
 * are dropped with it.
 *
 * Internet Gateways only publish a metric once it has seen traffic, so IGW metrics
 * are probed first and a metric with no data yields a single zero sample at
 * `window.start`. NAT metrics are never probed nor zero-filled.
 */
export async function collectMetricSamples(
  gateway: Gateway,
  metricName: string,
  window: TimeWindow,
  source: MetricSource,
  options: CollectorOptions = {}
): Promise<MetricSample[]> {
  if (!isCatalogMetric(gateway.kind, metricName)) {
    throw new UsageError(`Metric ${metricName} is not collected for ${gateway.kind} gateways`, {
      gatewayId: gateway.id,
      metricName,
    });
  }

  const chunks = chunkWindow(window, options.maxChunkMs ?? DEFAULT_MAX_CHUNK_MS);
  const query: MetricQuery = { gatewayId: gateway.id, kind: gateway.kind, metricName };
  const zeroFill = gateway.kind === 'IGW';

  if (zeroFill && source.metricExists) {
    let exists: boolean;
    try {
      exists = await source.metricExists(query);
    } catch (err) {
      throw new MetricFetchError(gateway.id, metricName, window, err);
    }

    if (!exists) {
      logger.debug('Metric not published, recording zero sample', { gatewayId: gateway.id, metricName });
      return [placeholderSample(gateway.id, metricName, new Date(window.start.getTime()))];
    }
  }

  const samples: MetricSample[] = [];
  for (const chunk of chunks) {
    let datapoints: RawDatapoint[];
    try {
      datapoints = await source.fetchDatapoints(query, chunk);
    } catch (err) {
      throw new MetricFetchError(gateway.id, metricName, chunk, err);
    }
    for (const datapoint of datapoints) {
      samples.push(toMetricSample(gateway.id, metricName, datapoint));
    }
  }

  if (samples.length === 0 && zeroFill) {
    logger.debug('Metric returned no datapoints, recording zero sample', { gatewayId: gateway.id, metricName });
    return [placeholderSample(gateway.id, metricName, new Date(window.start.getTime()))];
  }

  // Datapoints within one chunk come back unordered
  return samples.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Collect every catalog metric of the gateway's kind, one metric at a time.
 */
export async function collectGatewaySamples(
  gateway: Gateway,
  window: TimeWindow,
  source: MetricSource,
  options: CollectorOptions = {}
): Promise<MetricSample[]> {
  const table: MetricSample[] = [];

  for (const metricName of getMetricNames(gateway.kind)) {
    const samples = await collectMetricSamples(gateway, metricName, window, source, options);
    table.push(...samples);
  }

  logger.debug('Collected gateway samples', { gatewayId: gateway.id, samples: table.length });
  return table;
}
