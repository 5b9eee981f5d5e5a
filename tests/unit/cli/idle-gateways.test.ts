/**
 * Unit Tests for the idle-gateways command
 * AWS is replaced by in-process fakes of the narrow API views
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GetMetricStatisticsCommandInput } from '@aws-sdk/client-cloudwatch';
import { IdleGatewaysCLI, NO_DATA_MESSAGE, defaultOutputPath } from '../../../cli/idle-gateways.js';
import type { AwsApis } from '../../../backend/src/lib/cloud-provider/aws-clients.js';
import type { AnalyzerConfig } from '../../../backend/src/lib/environment-config.js';
import { resetAllCircuitBreakers } from '../../../backend/src/lib/circuit-breaker.js';

const NOW = new Date('2026-03-01T00:00:00Z');

function baseConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
  return {
    region: 'us-east-1',
    lookbackDays: 10,
    concurrency: 2,
    logLevel: 'CRITICAL',
    periodSeconds: 21600,
    maxChunkDays: 30,
    ...overrides,
  };
}

function createApis() {
  const getMetricStatistics = vi.fn(async (input: GetMetricStatisticsCommandInput) => {
    if (input.MetricName === 'BytesInFromSource') {
      return {
        $metadata: {},
        Datapoints: [
          { Timestamp: new Date('2026-02-25T00:00:00Z'), Sum: 0 },
          { Timestamp: new Date('2026-02-25T06:00:00Z'), Sum: 600 },
        ],
      };
    }
    return { $metadata: {}, Datapoints: [] };
  });
  const describeNatGateways = vi.fn<AwsApis['ec2']['describeNatGateways']>().mockResolvedValue({
    $metadata: {},
    NatGateways: [{ NatGatewayId: 'nat-1', VpcId: 'vpc-1', State: 'available', Tags: [{ Key: 'Name', Value: 'egress' }] }],
  });
  const describeInternetGateways = vi.fn<AwsApis['ec2']['describeInternetGateways']>().mockResolvedValue({
    $metadata: {},
    InternetGateways: [],
  });
  const getCallerIdentity = vi.fn<AwsApis['sts']['getCallerIdentity']>().mockResolvedValue({
    $metadata: {},
    Account: '111122223333',
  });

  const apis: AwsApis = {
    cloudWatch: {
      getMetricStatistics,
      listMetrics: vi.fn<AwsApis['cloudWatch']['listMetrics']>().mockResolvedValue({ $metadata: {}, Metrics: [] }),
    },
    ec2: {
      describeNatGateways,
      describeInternetGateways,
      describeVpcs: vi.fn<AwsApis['ec2']['describeVpcs']>().mockResolvedValue({
        $metadata: {},
        Vpcs: [{ VpcId: 'vpc-1', Tags: [{ Key: 'Name', Value: 'main' }] }],
      }),
    },
    sts: { getCallerIdentity },
  };
  return { apis, getMetricStatistics, describeNatGateways, describeInternetGateways, getCallerIdentity };
}

function createOutput() {
  const lines: string[] = [];
  return { lines, out: { print: (message: string) => lines.push(message) } };
}

describe('defaultOutputPath', () => {
  it('should name the report after account, region and local time', () => {
    const now = new Date(2026, 2, 5, 7, 8, 9);

    expect(defaultOutputPath('111122223333', 'us-east-1', now)).toBe(
      'gateway_analysis_111122223333_us-east-1_20260305_070809.xlsx'
    );
  });
});

describe('IdleGatewaysCLI', () => {
  let dir: string | undefined;

  afterEach(async () => {
    resetAllCircuitBreakers();
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should report no data and skip the workbook when nothing was collected', async () => {
    const { apis, describeNatGateways } = createApis();
    describeNatGateways.mockResolvedValue({ $metadata: {}, NatGateways: [] });
    const { lines, out } = createOutput();

    const run = await new IdleGatewaysCLI(baseConfig(), apis, out, () => NOW).run();

    expect(run.exitCode).toBe(0);
    expect(run.outputPath).toBeNull();
    expect(lines).toEqual(['Analyzing gateways for Account: 111122223333, Region: us-east-1', NO_DATA_MESSAGE]);
  });

  it('should analyze the region and write the workbook', async () => {
    dir = await mkdtemp(join(tmpdir(), 'idle-gateways-'));
    const output = join(dir, 'analysis.xlsx');
    const { apis, getMetricStatistics } = createApis();
    const { lines, out } = createOutput();

    const run = await new IdleGatewaysCLI(baseConfig({ output }), apis, out, () => NOW).run();

    expect(run.exitCode).toBe(0);
    expect(run.outputPath).toBe(output);
    expect(run.result.summaries).toHaveLength(1);
    expect(run.result.summaries[0]).toMatchObject({
      gatewayId: 'nat-1',
      displayName: 'egress',
      networkName: 'main',
      totalPeriods: 2,
      idlePeriods: 1,
      idlePercentage: 50,
      bytesIn: 600,
    });
    // one request per NAT metric, 10 days fit in a single chunk
    expect(getMetricStatistics).toHaveBeenCalledTimes(14);
    expect(lines[lines.length - 1]).toBe(`\nDetailed analysis saved to: ${output}`);
    expect((await stat(output)).size).toBeGreaterThan(0);
  });

  it('should exit with 1 when a gateway fails but still report the others', async () => {
    dir = await mkdtemp(join(tmpdir(), 'idle-gateways-'));
    const output = join(dir, 'analysis.xlsx');
    const { apis, getMetricStatistics, describeInternetGateways } = createApis();
    describeInternetGateways.mockResolvedValue({
      $metadata: {},
      InternetGateways: [{ InternetGatewayId: 'igw-1', Attachments: [{ VpcId: 'vpc-1' }] }],
    });
    getMetricStatistics.mockRejectedValue(new Error('AccessDenied'));
    const { lines, out } = createOutput();

    const run = await new IdleGatewaysCLI(baseConfig({ output }), apis, out, () => NOW).run();

    expect(run.exitCode).toBe(1);
    expect(run.result.failures.map((f) => f.gatewayId)).toEqual(['nat-1']);
    // the IGW never published anything, so it is reported from zero placeholders
    expect(run.result.summaries).toMatchObject([{ gatewayId: 'igw-1', status: 'Inactive' }]);
    // the first NAT metric fails and aborts the gateway
    expect(lines[1].startsWith('Failed to analyze nat-1: Failed to fetch BytesInFromDestination for nat-1')).toBe(true);
    expect(run.outputPath).toBe(output);
  });

  it('should label the report Unknown when the account cannot be resolved', async () => {
    const { apis, getCallerIdentity, describeNatGateways } = createApis();
    getCallerIdentity.mockRejectedValue(new Error('ExpiredToken'));
    describeNatGateways.mockResolvedValue({ $metadata: {}, NatGateways: [] });
    const { lines, out } = createOutput();

    await new IdleGatewaysCLI(baseConfig(), apis, out, () => NOW).run();

    expect(lines[0]).toBe('Analyzing gateways for Account: Unknown, Region: us-east-1');
  });
});
