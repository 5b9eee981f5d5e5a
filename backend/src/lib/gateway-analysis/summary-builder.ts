/**
 * Summary Builder
 *
 * Pure assembly of the per-gateway report record from aggregator output.
 */

import {
  UsageError,
  isGatewayKind,
  type AnalysisSummary,
  type Gateway,
  type GatewayStatistics,
} from '../../types/gateway.js';
import { round2 } from './idle-aggregator.js';
import { PERIOD_SECONDS } from './metric-catalog.js';

function assertPeriodCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${label} must be a non-negative integer`, { [label]: value });
  }
}

function validate(gateway: Gateway, statistics: GatewayStatistics, periodSeconds: number): void {
  if (!isGatewayKind(gateway.kind)) {
    throw new UsageError(`Unknown gateway kind: ${String(gateway.kind)}`, { gatewayId: gateway.id });
  }
  if (statistics.kind !== gateway.kind) {
    throw new UsageError('Statistics were computed for a different gateway kind', {
      gatewayId: gateway.id,
      gatewayKind: gateway.kind,
      statisticsKind: statistics.kind,
    });
  }
  assertPeriodCount(statistics.totalPeriods, 'totalPeriods');
  assertPeriodCount(statistics.idlePeriods, 'idlePeriods');
  if (statistics.idlePeriods > statistics.totalPeriods) {
    throw new UsageError('idlePeriods cannot exceed totalPeriods', {
      totalPeriods: statistics.totalPeriods,
      idlePeriods: statistics.idlePeriods,
    });
  }
  if (!Number.isFinite(periodSeconds) || periodSeconds <= 0) {
    throw new UsageError('Period length must be a positive number of seconds', { periodSeconds });
  }
}

/**
 * Build the summary record for one gateway.
 *
 * Rates are averaged over the observed periods; with no periods the divisor
 * falls back to one second, so the rates come out as 0.
 */
export function buildSummary(
  gateway: Gateway,
  statistics: GatewayStatistics,
  periodSeconds: number = PERIOD_SECONDS
): AnalysisSummary {
  validate(gateway, statistics, periodSeconds);

  const { totals } = statistics;
  const totalBytes = totals.bytesIn + totals.bytesOut;
  const totalPackets = totals.packetsIn + totals.packetsOut;
  const seconds = Math.max(statistics.totalPeriods * periodSeconds, 1);

  const base = {
    gatewayId: gateway.id,
    displayName: gateway.displayName,
    networkId: gateway.networkId,
    networkName: gateway.networkName,
    totalPeriods: statistics.totalPeriods,
    idlePeriods: statistics.idlePeriods,
    idlePercentage: statistics.idlePercentage,
    totalBytes,
    totalPackets,
    bytesPerSecondAvg: round2(totalBytes / seconds),
    packetsPerSecondAvg: round2(totalPackets / seconds),
  };

  if (statistics.kind === 'NAT') {
    return { ...base, ...statistics.totals, kind: 'NAT' };
  }
  return { ...base, ...statistics.totals, kind: 'IGW', status: statistics.status };
}
