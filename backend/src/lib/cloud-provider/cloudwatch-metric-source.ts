/**
 * CloudWatch Metric Source
 *
 * GetMetricStatistics for one metric and sub-window, ListMetrics for the
 * existence probe. Both go through the CloudWatch circuit breaker.
 */

import type { Datapoint, Dimension } from '@aws-sdk/client-cloudwatch';
import type { MetricQuery, MetricSource, RawDatapoint, TimeWindow } from '../../types/gateway.js';
import { getAwsCircuitBreaker, type CircuitBreaker } from '../circuit-breaker.js';
import { getKindCatalog, PERIOD_SECONDS } from '../gateway-analysis/metric-catalog.js';
import type { CloudWatchApi } from './aws-clients.js';

export interface CloudWatchMetricSourceOptions {
  periodSeconds?: number;
  breaker?: CircuitBreaker;
}

export function toRawDatapoint(datapoint: Datapoint): RawDatapoint | null {
  if (!datapoint.Timestamp) return null;
  return {
    timestamp: datapoint.Timestamp,
    sum: datapoint.Sum,
    average: datapoint.Average,
    maximum: datapoint.Maximum,
    minimum: datapoint.Minimum,
  };
}

export class CloudWatchMetricSource implements MetricSource {
  private periodSeconds: number;
  private breaker: CircuitBreaker;

  constructor(
    private cloudWatch: CloudWatchApi,
    options: CloudWatchMetricSourceOptions = {}
  ) {
    this.periodSeconds = options.periodSeconds ?? PERIOD_SECONDS;
    this.breaker = options.breaker ?? getAwsCircuitBreaker('cloudwatch');
  }

  private locate(query: MetricQuery): { namespace: string; dimensions: Dimension[] } {
    const catalog = getKindCatalog(query.kind);
    return {
      namespace: catalog.namespace,
      dimensions: [{ Name: catalog.dimensionName, Value: query.gatewayId }],
    };
  }

  async fetchDatapoints(query: MetricQuery, window: TimeWindow): Promise<RawDatapoint[]> {
    const { namespace, dimensions } = this.locate(query);

    const response = await this.breaker.execute(() =>
      this.cloudWatch.getMetricStatistics({
        Namespace: namespace,
        MetricName: query.metricName,
        Dimensions: dimensions,
        StartTime: window.start,
        EndTime: window.end,
        Period: this.periodSeconds,
        Statistics: ['Sum', 'Average', 'Maximum', 'Minimum'],
      })
    );

    const datapoints: RawDatapoint[] = [];
    for (const datapoint of response.Datapoints ?? []) {
      const raw = toRawDatapoint(datapoint);
      if (raw) datapoints.push(raw);
    }
    return datapoints;
  }

  async metricExists(query: MetricQuery): Promise<boolean> {
    const { namespace, dimensions } = this.locate(query);

    const response = await this.breaker.execute(() =>
      this.cloudWatch.listMetrics({
        Namespace: namespace,
        MetricName: query.metricName,
        Dimensions: dimensions,
      })
    );

    return (response.Metrics ?? []).length > 0;
  }
}
