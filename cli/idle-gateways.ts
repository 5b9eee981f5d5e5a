/**
 * Idle Gateways CLI - command implementation
 *
 * Discovers the gateways of one region, analyzes their CloudWatch counters and
 * writes the Excel report. AWS access goes through the injected APIs.
 */

import { randomUUID } from 'crypto';
import type { AnalyzerConfig } from '../backend/src/lib/environment-config.js';
import type { AwsApis } from '../backend/src/lib/cloud-provider/aws-clients.js';
import { AwsGatewayDiscovery } from '../backend/src/lib/cloud-provider/aws-gateway-discovery.js';
import { CloudWatchMetricSource } from '../backend/src/lib/cloud-provider/cloudwatch-metric-source.js';
import { resolveAccountId } from '../backend/src/lib/aws-helpers.js';
import { analyzeGateways, DAY_MS } from '../backend/src/lib/gateway-analysis/index.js';
import { buildWorkbook, writeWorkbook, type ReportContext } from '../backend/src/lib/reports/excel-report.js';
import { formatConsoleSummary } from '../backend/src/lib/reports/console-summary.js';
import { logger } from '../backend/src/lib/logger.js';
import type { AnalysisResult } from '../backend/src/types/gateway.js';

export const NO_DATA_MESSAGE = 'No metrics data found for the specified period.';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** gateway_analysis_<account>_<region>_<YYYYMMDD_HHMMSS>.xlsx, local time */
export function defaultOutputPath(accountId: string, region: string, now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `gateway_analysis_${accountId}_${region}_${date}_${time}.xlsx`;
}

export interface CliOutput {
  print(message: string): void;
}

export interface IdleGatewaysRun {
  exitCode: number;
  result: AnalysisResult;
  outputPath: string | null;
}

export class IdleGatewaysCLI {
  constructor(
    private config: AnalyzerConfig,
    private apis: AwsApis,
    private out: CliOutput = { print: (message) => console.log(message) },
    private now: () => Date = () => new Date()
  ) {}

  async run(): Promise<IdleGatewaysRun> {
    const { region } = this.config;
    const accountId = await resolveAccountId(this.apis.sts);
    logger.appendContext({ runId: randomUUID(), accountId, region });

    this.out.print(`Analyzing gateways for Account: ${accountId}, Region: ${region}`);

    const gateways = await new AwsGatewayDiscovery(this.apis.ec2).listGateways();
    const source = new CloudWatchMetricSource(this.apis.cloudWatch, { periodSeconds: this.config.periodSeconds });

    const result = await analyzeGateways(gateways, this.config.lookbackDays, source, {
      concurrency: this.config.concurrency,
      periodSeconds: this.config.periodSeconds,
      maxChunkMs: this.config.maxChunkDays * DAY_MS,
      now: this.now,
    });

    this.reportFailures(result);
    const exitCode = result.failures.length > 0 ? 1 : 0;

    if (result.samples.length === 0) {
      this.out.print(NO_DATA_MESSAGE);
      return { exitCode, result, outputPath: null };
    }

    const context: ReportContext = { accountId, region };
    const outputPath = this.config.output ?? defaultOutputPath(accountId, region, this.now());
    await writeWorkbook(buildWorkbook(result, context), outputPath);

    this.out.print(formatConsoleSummary(result.summaries, context));
    this.out.print(`\nDetailed analysis saved to: ${outputPath}`);

    return { exitCode, result, outputPath };
  }

  private reportFailures(result: AnalysisResult): void {
    for (const failure of result.failures) {
      this.out.print(`Failed to analyze ${failure.gatewayId}: ${failure.error.message}`);
    }
  }
}
