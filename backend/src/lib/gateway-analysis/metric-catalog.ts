/**
 * Gateway Metric Catalog
 *
 * Static per-kind configuration: which CloudWatch metrics are collected for a
 * gateway kind, where they live, and how they roll up into summary fields.
 * Adding a gateway kind means adding an entry here; the aggregation loop does not change.
 */

import { UsageError, type GatewayKind, type IgwTrafficTotals, type NatTrafficTotals } from '../../types/gateway.js';

/** Sampling granularity of every counter we request (6 hours) */
export const PERIOD_SECONDS = 21600;

/** Longest range requested in a single GetMetricStatistics call */
export const MAX_CHUNK_DAYS = 30;

export const DAY_MS = 24 * 60 * 60 * 1000;

export const NAT_METRICS = [
  'BytesInFromDestination',
  'BytesInFromSource',
  'BytesOutToDestination',
  'BytesOutToSource',
  'PacketsInFromDestination',
  'PacketsInFromSource',
  'PacketsOutToDestination',
  'PacketsOutToSource',
  'ConnectionAttemptCount',
  'ConnectionEstablishedCount',
  'ErrorPortAllocation',
  'IdleTimeoutCount',
  'ActiveConnectionCount',
  'ConnectionEstablishedRate',
] as const;

export const IGW_METRICS = [
  'BytesInFromDestination',
  'BytesOutToDestination',
  'PacketsInFromDestination',
  'PacketsOutToDestination',
  'BytesDropCountBlackholeIPv4',
  'BytesDropCountNoRouteIPv4',
  'PacketsDropCountBlackholeIPv4',
  'PacketsDropCountNoRouteIPv4',
] as const;

export type NatMetricName = (typeof NAT_METRICS)[number];
export type IgwMetricName = (typeof IGW_METRICS)[number];

/**
 * How a summary field is derived from its source metrics:
 * - sum: total of the `sum` statistic
 * - max: highest `maximum` statistic
 * - mean: arithmetic mean of the `average` statistic
 */
export type FieldReduction = 'sum' | 'max' | 'mean';

export interface FieldGrouping<TField extends string, TMetric extends string> {
  field: TField;
  metrics: readonly TMetric[];
  reduction: FieldReduction;
}

export interface KindCatalog<TTotals, TMetric extends string> {
  kind: GatewayKind;
  namespace: string;
  dimensionName: string;
  metrics: readonly TMetric[];
  fields: readonly FieldGrouping<Extract<keyof TTotals, string>, TMetric>[];
  /** Totals reported when the gateway has no samples at all */
  emptyTotals: TTotals;
}

export const NAT_CATALOG: KindCatalog<NatTrafficTotals, NatMetricName> = {
  kind: 'NAT',
  namespace: 'AWS/NATGateway',
  dimensionName: 'NatGatewayId',
  metrics: NAT_METRICS,
  fields: [
    { field: 'bytesIn', metrics: ['BytesInFromSource', 'BytesInFromDestination'], reduction: 'sum' },
    { field: 'bytesOut', metrics: ['BytesOutToSource', 'BytesOutToDestination'], reduction: 'sum' },
    { field: 'packetsIn', metrics: ['PacketsInFromSource', 'PacketsInFromDestination'], reduction: 'sum' },
    { field: 'packetsOut', metrics: ['PacketsOutToSource', 'PacketsOutToDestination'], reduction: 'sum' },
    { field: 'connectionAttempts', metrics: ['ConnectionAttemptCount'], reduction: 'sum' },
    { field: 'connectionTimeouts', metrics: ['IdleTimeoutCount'], reduction: 'sum' },
    { field: 'portAllocationErrors', metrics: ['ErrorPortAllocation'], reduction: 'sum' },
    { field: 'maxActiveConnections', metrics: ['ActiveConnectionCount'], reduction: 'max' },
    { field: 'avgActiveConnections', metrics: ['ActiveConnectionCount'], reduction: 'mean' },
  ],
  emptyTotals: {
    bytesIn: 0,
    bytesOut: 0,
    packetsIn: 0,
    packetsOut: 0,
    connectionAttempts: 0,
    connectionTimeouts: 0,
    portAllocationErrors: 0,
    maxActiveConnections: 0,
    avgActiveConnections: 0,
  },
};

// IGW has no "source" direction, so each traffic field maps to a single metric
export const IGW_CATALOG: KindCatalog<IgwTrafficTotals, IgwMetricName> = {
  kind: 'IGW',
  namespace: 'AWS/IGW',
  dimensionName: 'InternetGatewayId',
  metrics: IGW_METRICS,
  fields: [
    { field: 'bytesIn', metrics: ['BytesInFromDestination'], reduction: 'sum' },
    { field: 'bytesOut', metrics: ['BytesOutToDestination'], reduction: 'sum' },
    { field: 'packetsIn', metrics: ['PacketsInFromDestination'], reduction: 'sum' },
    { field: 'packetsOut', metrics: ['PacketsOutToDestination'], reduction: 'sum' },
    { field: 'blackholeDropBytes', metrics: ['BytesDropCountBlackholeIPv4'], reduction: 'sum' },
    { field: 'noRouteDropBytes', metrics: ['BytesDropCountNoRouteIPv4'], reduction: 'sum' },
    { field: 'blackholeDropPackets', metrics: ['PacketsDropCountBlackholeIPv4'], reduction: 'sum' },
    { field: 'noRouteDropPackets', metrics: ['PacketsDropCountNoRouteIPv4'], reduction: 'sum' },
  ],
  emptyTotals: {
    bytesIn: 0,
    bytesOut: 0,
    packetsIn: 0,
    packetsOut: 0,
    blackholeDropBytes: 0,
    noRouteDropBytes: 0,
    blackholeDropPackets: 0,
    noRouteDropPackets: 0,
  },
};

export type AnyKindCatalog = typeof NAT_CATALOG | typeof IGW_CATALOG;

export function getKindCatalog(kind: 'NAT'): typeof NAT_CATALOG;
export function getKindCatalog(kind: 'IGW'): typeof IGW_CATALOG;
export function getKindCatalog(kind: GatewayKind): AnyKindCatalog;
export function getKindCatalog(kind: GatewayKind): AnyKindCatalog {
  switch (kind) {
    case 'NAT':
      return NAT_CATALOG;
    case 'IGW':
      return IGW_CATALOG;
    default:
      throw new UsageError(`Unknown gateway kind: ${String(kind)}`, { kind: String(kind) });
  }
}

export function getMetricNames(kind: GatewayKind): readonly string[] {
  return getKindCatalog(kind).metrics;
}

export function isCatalogMetric(kind: GatewayKind, metricName: string): boolean {
  return getMetricNames(kind).includes(metricName);
}

/** Byte and packet counters, including the IGW drop counters */
export function isTrafficMetric(metricName: string): boolean {
  return metricName.includes('Bytes') || metricName.includes('Packets');
}

export function getTrafficMetrics(kind: GatewayKind): string[] {
  return getMetricNames(kind).filter(isTrafficMetric);
}
