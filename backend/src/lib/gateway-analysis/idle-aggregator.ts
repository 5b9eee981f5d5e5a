/**
 * Traffic/Idle Aggregator
 *
 * Reduces one gateway's sample table to period counts, idle percentage and the
 * per-field totals described by the kind catalog.
 */

import type {
  Gateway,
  GatewayStatistics,
  GatewayStatus,
  MetricSample,
  PeriodStatistics,
} from '../../types/gateway.js';
import {
  IGW_CATALOG,
  NAT_CATALOG,
  getMetricNames,
  isTrafficMetric,
  type FieldGrouping,
} from './metric-catalog.js';

export function round2(value: number): number {
  return parseFloat(value.toFixed(2));
}

/**
 * Single pass over the run's table. Sample order is preserved within each gateway.
 */
export function groupSamplesByGateway(samples: readonly MetricSample[]): Map<string, MetricSample[]> {
  const grouped = new Map<string, MetricSample[]>();
  for (const sample of samples) {
    const bucket = grouped.get(sample.gatewayId);
    if (bucket) {
      bucket.push(sample);
    } else {
      grouped.set(sample.gatewayId, [sample]);
    }
  }
  return grouped;
}

function groupByMetric(samples: readonly MetricSample[]): Map<string, MetricSample[]> {
  const grouped = new Map<string, MetricSample[]>();
  for (const sample of samples) {
    const bucket = grouped.get(sample.metricName) ?? [];
    bucket.push(sample);
    grouped.set(sample.metricName, bucket);
  }
  return grouped;
}

interface PeriodObservation {
  trafficObserved: boolean;
  trafficNonZero: boolean;
}

/**
 * A period is idle when traffic metrics were observed at that timestamp and every
 * observed traffic sample summed to zero. Traffic metrics absent at the timestamp
 * are not required: a partially observed period can still count as idle.
 *
 * idlePercentage is reported as 0 when there are no periods at all.
 */
export function countPeriods(samples: readonly MetricSample[]): PeriodStatistics {
  const periods = new Map<number, PeriodObservation>();

  for (const sample of samples) {
    const key = sample.timestamp.getTime();
    const period = periods.get(key) ?? { trafficObserved: false, trafficNonZero: false };

    if (isTrafficMetric(sample.metricName)) {
      period.trafficObserved = true;
      if (sample.sum !== 0) {
        period.trafficNonZero = true;
      }
    }
    periods.set(key, period);
  }

  const totalPeriods = periods.size;
  let idlePeriods = 0;
  for (const period of periods.values()) {
    if (period.trafficObserved && !period.trafficNonZero) {
      idlePeriods++;
    }
  }

  const idlePercentage = totalPeriods > 0 ? round2((idlePeriods / totalPeriods) * 100) : 0;
  return { totalPeriods, idlePeriods, idlePercentage };
}

function reduceGroup(group: FieldGrouping<string, string>, byMetric: Map<string, MetricSample[]>): number {
  const samples = group.metrics.flatMap((metric) => byMetric.get(metric) ?? []);

  switch (group.reduction) {
    case 'sum':
      return samples.reduce((total, s) => total + s.sum, 0);
    case 'max':
      return samples.length > 0 ? samples.reduce((max, s) => Math.max(max, s.maximum), -Infinity) : 0;
    case 'mean':
      return samples.length > 0 ? samples.reduce((total, s) => total + s.average, 0) / samples.length : 0;
  }
}

/**
 * Evaluate every field grouping of a catalog. Fields whose metrics are absent stay at 0.
 */
export function reduceFields<TField extends string>(
  fields: readonly FieldGrouping<TField, string>[],
  emptyTotals: Record<TField, number>,
  byMetric: Map<string, MetricSample[]>
): Record<TField, number> {
  const totals = { ...emptyTotals };
  for (const group of fields) {
    totals[group.field] = reduceGroup(group, byMetric);
  }
  return totals;
}

/** Inactive only when every sample of the gateway, traffic or not, has a zero sum */
export function classifyStatus(samples: readonly MetricSample[]): GatewayStatus {
  return samples.every((s) => s.sum === 0) ? 'Inactive' : 'Active';
}

/**
 * Aggregate the samples of one gateway.
 *
 * Samples belonging to another gateway, or to a metric outside the gateway's
 * kind catalog, are ignored, so the full run table can be passed as is.
 */
export function aggregateGatewaySamples(gateway: Gateway, samples: readonly MetricSample[]): GatewayStatistics {
  const catalogMetrics = new Set(getMetricNames(gateway.kind));
  const own = samples.filter((s) => s.gatewayId === gateway.id && catalogMetrics.has(s.metricName));

  const periods = countPeriods(own);
  const byMetric = groupByMetric(own);

  if (gateway.kind === 'NAT') {
    return {
      ...periods,
      kind: 'NAT',
      totals: reduceFields(NAT_CATALOG.fields, NAT_CATALOG.emptyTotals, byMetric),
    };
  }

  return {
    ...periods,
    kind: 'IGW',
    totals: reduceFields(IGW_CATALOG.fields, IGW_CATALOG.emptyTotals, byMetric),
    status: classifyStatus(own),
  };
}
