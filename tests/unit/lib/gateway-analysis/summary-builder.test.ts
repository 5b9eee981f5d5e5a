/**
 * Unit Tests for the summary builder
 */

import { describe, it, expect } from 'vitest';
import { buildSummary } from '../../../../backend/src/lib/gateway-analysis/summary-builder.js';
import { NAT_CATALOG, IGW_CATALOG } from '../../../../backend/src/lib/gateway-analysis/metric-catalog.js';
import {
  UsageError,
  type Gateway,
  type GatewayStatistics,
  type PeriodStatistics,
} from '../../../../backend/src/types/gateway.js';

const natGateway: Gateway = {
  id: 'nat-1',
  kind: 'NAT',
  displayName: 'egress-nat',
  networkId: 'vpc-1',
  networkName: 'main',
};

const igwGateway: Gateway = {
  id: 'igw-1',
  kind: 'IGW',
  displayName: 'IGW-main',
  networkId: null,
  networkName: null,
};

function natStatistics(overrides: Partial<PeriodStatistics> = {}): GatewayStatistics {
  return {
    kind: 'NAT',
    totalPeriods: 2,
    idlePeriods: 1,
    idlePercentage: 50,
    ...overrides,
    totals: {
      ...NAT_CATALOG.emptyTotals,
      bytesIn: 129600,
      bytesOut: 43200,
      packetsIn: 21600,
      connectionAttempts: 9,
      maxActiveConnections: 12,
      avgActiveConnections: 3.5,
    },
  };
}

describe('buildSummary', () => {
  it('should derive totals and per-second rates for a NAT gateway', () => {
    const summary = buildSummary(natGateway, natStatistics());

    expect(summary).toEqual({
      kind: 'NAT',
      gatewayId: 'nat-1',
      displayName: 'egress-nat',
      networkId: 'vpc-1',
      networkName: 'main',
      totalPeriods: 2,
      idlePeriods: 1,
      idlePercentage: 50,
      bytesIn: 129600,
      bytesOut: 43200,
      packetsIn: 21600,
      packetsOut: 0,
      connectionAttempts: 9,
      connectionTimeouts: 0,
      portAllocationErrors: 0,
      maxActiveConnections: 12,
      avgActiveConnections: 3.5,
      totalBytes: 172800,
      totalPackets: 21600,
      bytesPerSecondAvg: 4,
      packetsPerSecondAvg: 0.5,
    });
  });

  it('should carry the IGW status and drop counters', () => {
    const statistics: GatewayStatistics = {
      kind: 'IGW',
      totalPeriods: 1,
      idlePeriods: 1,
      idlePercentage: 100,
      status: 'Inactive',
      totals: { ...IGW_CATALOG.emptyTotals, noRouteDropPackets: 3 },
    };

    const summary = buildSummary(igwGateway, statistics);

    expect(summary).toMatchObject({
      kind: 'IGW',
      status: 'Inactive',
      networkId: null,
      noRouteDropPackets: 3,
      totalBytes: 0,
      bytesPerSecondAvg: 0,
    });
  });

  it('should divide by one second when there are no periods', () => {
    const summary = buildSummary(
      natGateway,
      natStatistics({ totalPeriods: 0, idlePeriods: 0, idlePercentage: 0 })
    );

    expect(summary.bytesPerSecondAvg).toBe(172800);
    expect(summary.idlePercentage).toBe(0);
  });

  it('should use the given period length for rates', () => {
    const summary = buildSummary(natGateway, natStatistics(), 3600);

    // 172800 bytes over 2 * 3600 s
    expect(summary.bytesPerSecondAvg).toBe(24);
    expect(summary.packetsPerSecondAvg).toBe(3);
  });

  it('should reject statistics of another kind', () => {
    expect(() => buildSummary(igwGateway, natStatistics())).toThrow(UsageError);
  });

  it('should reject more idle periods than total periods', () => {
    expect(() => buildSummary(natGateway, natStatistics({ idlePeriods: 3 }))).toThrow(
      'idlePeriods cannot exceed totalPeriods'
    );
  });

  it('should reject negative or fractional period counts', () => {
    expect(() => buildSummary(natGateway, natStatistics({ totalPeriods: -1, idlePeriods: 0 }))).toThrow(UsageError);
    expect(() => buildSummary(natGateway, natStatistics({ totalPeriods: 2.5 }))).toThrow(UsageError);
  });

  it('should reject a non-positive period length', () => {
    expect(() => buildSummary(natGateway, natStatistics(), 0)).toThrow(UsageError);
  });

  it('should reject an unknown gateway kind', () => {
    const unknownKind: Gateway = JSON.parse(
      '{"id":"vgw-1","kind":"VPN","displayName":"vpn","networkId":null,"networkName":null}'
    );

    expect(() => buildSummary(unknownKind, natStatistics())).toThrow('Unknown gateway kind: VPN');
  });
});
