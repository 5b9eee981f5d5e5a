/**
 * Narrow views over the AWS SDK clients used by the analyzer.
 *
 * Discovery and metric collection depend on these interfaces rather than on
 * the SDK clients, so tests can hand in plain in-process fakes.
 */

import {
  CloudWatchClient,
  GetMetricStatisticsCommand,
  ListMetricsCommand,
  type GetMetricStatisticsCommandInput,
  type GetMetricStatisticsCommandOutput,
  type ListMetricsCommandInput,
  type ListMetricsCommandOutput,
} from '@aws-sdk/client-cloudwatch';
import {
  EC2Client,
  DescribeInternetGatewaysCommand,
  DescribeNatGatewaysCommand,
  DescribeVpcsCommand,
  type DescribeInternetGatewaysCommandInput,
  type DescribeInternetGatewaysCommandOutput,
  type DescribeNatGatewaysCommandInput,
  type DescribeNatGatewaysCommandOutput,
  type DescribeVpcsCommandInput,
  type DescribeVpcsCommandOutput,
} from '@aws-sdk/client-ec2';
import {
  STSClient,
  GetCallerIdentityCommand,
  type GetCallerIdentityCommandOutput,
} from '@aws-sdk/client-sts';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';

export interface CloudWatchApi {
  getMetricStatistics(input: GetMetricStatisticsCommandInput): Promise<GetMetricStatisticsCommandOutput>;
  listMetrics(input: ListMetricsCommandInput): Promise<ListMetricsCommandOutput>;
}

export interface Ec2Api {
  describeNatGateways(input: DescribeNatGatewaysCommandInput): Promise<DescribeNatGatewaysCommandOutput>;
  describeInternetGateways(input: DescribeInternetGatewaysCommandInput): Promise<DescribeInternetGatewaysCommandOutput>;
  describeVpcs(input: DescribeVpcsCommandInput): Promise<DescribeVpcsCommandOutput>;
}

export interface StsApi {
  getCallerIdentity(): Promise<GetCallerIdentityCommandOutput>;
}

export interface AwsClientOptions {
  region: string;
  /** Omit to use the SDK default credential chain */
  credentials?: AwsCredentialIdentityProvider;
}

export interface AwsApis {
  cloudWatch: CloudWatchApi;
  ec2: Ec2Api;
  sts: StsApi;
}

export function createAwsApis(options: AwsClientOptions): AwsApis {
  const cloudWatchClient = new CloudWatchClient(options);
  const ec2Client = new EC2Client(options);
  const stsClient = new STSClient(options);

  return {
    cloudWatch: {
      getMetricStatistics: (input) => cloudWatchClient.send(new GetMetricStatisticsCommand(input)),
      listMetrics: (input) => cloudWatchClient.send(new ListMetricsCommand(input)),
    },
    ec2: {
      describeNatGateways: (input) => ec2Client.send(new DescribeNatGatewaysCommand(input)),
      describeInternetGateways: (input) => ec2Client.send(new DescribeInternetGatewaysCommand(input)),
      describeVpcs: (input) => ec2Client.send(new DescribeVpcsCommand(input)),
    },
    sts: {
      getCallerIdentity: () => stsClient.send(new GetCallerIdentityCommand({})),
    },
  };
}
