/**
 * Human-readable summary printed at the end of a CLI run
 */

import type { AnalysisSummary } from '../../types/gateway.js';
import type { ReportContext } from './excel-report.js';

const RULE = '='.repeat(80);

const integer = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const decimal = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

function formatGateway(summary: AnalysisSummary): string[] {
  const lines = [
    '',
    `${summary.kind} Gateway: ${summary.displayName} (${summary.gatewayId})`,
    `  VPC: ${summary.networkName ?? 'Unknown'} (${summary.networkId ?? 'Unknown'})`,
    `  Idle: ${summary.idlePercentage}% (${summary.idlePeriods}/${summary.totalPeriods} periods)`,
    `  Traffic: ${integer.format(summary.bytesIn)} bytes in / ${integer.format(summary.bytesOut)} bytes out`,
    `  Packets: ${integer.format(summary.packetsIn)} in / ${integer.format(summary.packetsOut)} out`,
    `  Avg rates: ${decimal.format(summary.bytesPerSecondAvg)} B/s, ${decimal.format(summary.packetsPerSecondAvg)} pkt/s`,
  ];

  if (summary.kind === 'NAT') {
    lines.push(
      `  Connections: ${integer.format(summary.connectionAttempts)} attempts, ` +
        `${integer.format(summary.connectionTimeouts)} timeouts, ` +
        `${integer.format(summary.portAllocationErrors)} port errors`,
      `  Active connections: max ${integer.format(summary.maxActiveConnections)}, ` +
        `avg ${decimal.format(summary.avgActiveConnections)}`
    );
  } else {
    lines.push(
      `  Status: ${summary.status}`,
      `  Drops: ${integer.format(summary.blackholeDropBytes)} blackhole bytes, ` +
        `${integer.format(summary.noRouteDropBytes)} no-route bytes`
    );
  }

  return lines;
}

export function formatConsoleSummary(summaries: readonly AnalysisSummary[], context: ReportContext): string {
  const lines = [
    '',
    'Gateway Analysis Summary',
    RULE,
    `Account: ${context.accountId}  |  Region: ${context.region}`,
    RULE,
    ...summaries.flatMap(formatGateway),
  ];
  return lines.join('\n');
}
