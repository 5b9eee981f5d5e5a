/**
 * Gateway Idle Analysis - Type Definitions
 *
 * Shared types for the aggregation engine and the collaborators that feed it
 * (gateway discovery, metric source, report writer).
 */

// ============================================================================
// GATEWAYS
// ============================================================================

export type GatewayKind = 'NAT' | 'IGW';

export function isGatewayKind(value: unknown): value is GatewayKind {
  return value === 'NAT' || value === 'IGW';
}

export interface Gateway {
  id: string;
  kind: GatewayKind;
  displayName: string;
  /** VPC the gateway belongs to. Null for a detached Internet Gateway. */
  networkId: string | null;
  networkName: string | null;
}

// ============================================================================
// TIME SERIES
// ============================================================================

/** Closed-open interval [start, end) */
export interface TimeWindow {
  start: Date;
  end: Date;
}

/** Datapoint as returned by the metric source; any statistic may be missing */
export interface RawDatapoint {
  timestamp: Date;
  sum?: number;
  average?: number;
  maximum?: number;
  minimum?: number;
}

export interface MetricSample {
  gatewayId: string;
  metricName: string;
  timestamp: Date;
  sum: number;
  average: number;
  maximum: number;
  minimum: number;
}

export interface MetricQuery {
  gatewayId: string;
  kind: GatewayKind;
  metricName: string;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface GatewayDiscovery {
  /** NAT Gateways first, then Internet Gateways */
  listGateways(): Promise<Gateway[]>;
}

export interface MetricSource {
  fetchDatapoints(query: MetricQuery, window: TimeWindow): Promise<RawDatapoint[]>;
  /** Whether the metric was ever published for the gateway. Used for IGW zero-fill only. */
  metricExists?(query: MetricQuery): Promise<boolean>;
}

// ============================================================================
// ANALYSIS OUTPUT
// ============================================================================

export type GatewayStatus = 'Active' | 'Inactive';

export interface NatTrafficTotals {
  bytesIn: number;
  bytesOut: number;
  packetsIn: number;
  packetsOut: number;
  connectionAttempts: number;
  connectionTimeouts: number;
  portAllocationErrors: number;
  maxActiveConnections: number;
  avgActiveConnections: number;
}

export interface IgwTrafficTotals {
  bytesIn: number;
  bytesOut: number;
  packetsIn: number;
  packetsOut: number;
  blackholeDropBytes: number;
  noRouteDropBytes: number;
  blackholeDropPackets: number;
  noRouteDropPackets: number;
}

export interface PeriodStatistics {
  totalPeriods: number;
  idlePeriods: number;
  idlePercentage: number;
}

export type GatewayStatistics =
  | (PeriodStatistics & { kind: 'NAT'; totals: NatTrafficTotals })
  | (PeriodStatistics & { kind: 'IGW'; totals: IgwTrafficTotals; status: GatewayStatus });

interface SummaryBase extends PeriodStatistics {
  gatewayId: string;
  displayName: string;
  networkId: string | null;
  networkName: string | null;
  totalBytes: number;
  totalPackets: number;
  bytesPerSecondAvg: number;
  packetsPerSecondAvg: number;
}

export interface NatAnalysisSummary extends SummaryBase, NatTrafficTotals {
  kind: 'NAT';
}

export interface IgwAnalysisSummary extends SummaryBase, IgwTrafficTotals {
  kind: 'IGW';
  status: GatewayStatus;
}

export type AnalysisSummary = NatAnalysisSummary | IgwAnalysisSummary;

export interface GatewayFailure {
  gatewayId: string;
  error: Error;
}

export interface AnalysisResult {
  window: TimeWindow;
  summaries: AnalysisSummary[];
  samples: MetricSample[];
  failures: GatewayFailure[];
}

// ============================================================================
// ERRORS
// ============================================================================

export type GatewayAnalysisErrorCode = 'USAGE_ERROR' | 'METRIC_FETCH_FAILED' | 'CONFIGURATION_ERROR';

export class GatewayAnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: GatewayAnalysisErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayAnalysisError';
  }
}

/**
 * Invalid input handed to the engine. Never partially processed.
 */
export class UsageError extends GatewayAnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE_ERROR', details);
    this.name = 'UsageError';
  }
}

/**
 * Upstream fetch failure for one (gateway, metric) pair.
 * Carries the failing sub-window so the caller can retry it.
 */
export class MetricFetchError extends GatewayAnalysisError {
  constructor(
    public readonly gatewayId: string,
    public readonly metricName: string,
    public readonly window: TimeWindow,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to fetch ${metricName} for ${gatewayId} between ${window.start.toISOString()} and ${window.end.toISOString()}: ${reason}`,
      'METRIC_FETCH_FAILED',
      {
        gatewayId,
        metricName,
        windowStart: window.start.toISOString(),
        windowEnd: window.end.toISOString(),
      }
    );
    this.name = 'MetricFetchError';
    this.cause = cause;
  }
}

export class ConfigurationError extends GatewayAnalysisError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, 'CONFIGURATION_ERROR', { issues });
    this.name = 'ConfigurationError';
  }
}
