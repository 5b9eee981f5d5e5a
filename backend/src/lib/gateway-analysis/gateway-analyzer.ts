/**
 * Gateway Analyzer
 *
 * Entry point of the engine: collect -> aggregate -> summarize for each gateway.
 * Gateways share nothing, so they are processed in parallel (bounded); a failure
 * is recorded against its gateway and the others carry on.
 */

import {
  UsageError,
  isGatewayKind,
  type AnalysisResult,
  type AnalysisSummary,
  type Gateway,
  type GatewayFailure,
  type MetricSample,
  type MetricSource,
  type TimeWindow,
} from '../../types/gateway.js';
import { ConcurrencyLimiter } from '../concurrency-limiter.js';
import { logger } from '../logger.js';
import { aggregateGatewaySamples } from './idle-aggregator.js';
import { DAY_MS, PERIOD_SECONDS } from './metric-catalog.js';
import { collectGatewaySamples, type CollectorOptions } from './sample-collector.js';
import { buildSummary } from './summary-builder.js';

export const DEFAULT_CONCURRENCY = 4;
const SLOW_GATEWAY_THRESHOLD_MS = 60_000;

export interface AnalyzeOptions extends CollectorOptions {
  periodSeconds?: number;
  concurrency?: number;
  /** Clock used for the end of the lookback window */
  now?: () => Date;
}

export interface GatewayAnalysis {
  summary: AnalysisSummary;
  samples: MetricSample[];
}

type GatewayOutcome =
  | { ok: true; analysis: GatewayAnalysis }
  | { ok: false; failure: GatewayFailure };

export function lookbackWindow(lookbackDays: number, now: Date): TimeWindow {
  if (!Number.isInteger(lookbackDays) || lookbackDays <= 0) {
    throw new UsageError('Lookback must be a positive whole number of days', { lookbackDays });
  }
  return {
    start: new Date(now.getTime() - lookbackDays * DAY_MS),
    end: new Date(now.getTime()),
  };
}

function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new UsageError('Concurrency must be a positive whole number', { concurrency });
  }
}

function assertUniqueIds(gateways: readonly Gateway[]): void {
  const seen = new Set<string>();
  for (const gateway of gateways) {
    if (seen.has(gateway.id)) {
      throw new UsageError(`Gateway ${gateway.id} listed more than once`, { gatewayId: gateway.id });
    }
    seen.add(gateway.id);
  }
}

/**
 * Run the full pipeline for a single gateway.
 */
export async function analyzeGateway(
  gateway: Gateway,
  window: TimeWindow,
  source: MetricSource,
  options: AnalyzeOptions = {}
): Promise<GatewayAnalysis> {
  if (!isGatewayKind(gateway.kind)) {
    throw new UsageError(`Unknown gateway kind: ${String(gateway.kind)}`, { gatewayId: gateway.id });
  }
  const samples = await collectGatewaySamples(gateway, window, source, options);
  const statistics = aggregateGatewaySamples(gateway, samples);
  const summary = buildSummary(gateway, statistics, options.periodSeconds ?? PERIOD_SECONDS);
  return { summary, samples };
}

async function settleGateway(
  gateway: Gateway,
  window: TimeWindow,
  source: MetricSource,
  options: AnalyzeOptions
): Promise<GatewayOutcome> {
  const startedAt = Date.now();
  logger.info('Analyzing gateway', { gatewayId: gateway.id, kind: gateway.kind, name: gateway.displayName });

  try {
    const analysis = await analyzeGateway(gateway, window, source, options);
    const durationMs = Date.now() - startedAt;
    if (durationMs > SLOW_GATEWAY_THRESHOLD_MS) {
      logger.slowOperation('analyze-gateway', durationMs, SLOW_GATEWAY_THRESHOLD_MS, { gatewayId: gateway.id });
    }
    logger.info('Gateway analyzed', {
      gatewayId: gateway.id,
      idlePercentage: analysis.summary.idlePercentage,
      samples: analysis.samples.length,
      durationMs,
    });
    return { ok: true, analysis };
  } catch (err) {
    logger.error('Gateway analysis failed', err, { gatewayId: gateway.id });
    const error = err instanceof Error ? err : new Error(String(err));
    return { ok: false, failure: { gatewayId: gateway.id, error } };
  }
}

/**
 * Analyze every gateway over the last `lookbackDays` days.
 *
 * Summaries and samples keep the order of `gateways`. Samples of a failed
 * gateway are left out of the result.
 */
export async function analyzeGateways(
  gateways: readonly Gateway[],
  lookbackDays: number,
  source: MetricSource,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const window = lookbackWindow(lookbackDays, options.now ? options.now() : new Date());
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  assertConcurrency(concurrency);
  assertUniqueIds(gateways);

  const limiter = new ConcurrencyLimiter(concurrency);
  const outcomes = await Promise.all(
    gateways.map((gateway) => limiter.run(() => settleGateway(gateway, window, source, options)))
  );

  const result: AnalysisResult = { window, summaries: [], samples: [], failures: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) {
      result.summaries.push(outcome.analysis.summary);
      result.samples.push(...outcome.analysis.samples);
    } else {
      result.failures.push(outcome.failure);
    }
  }

  logger.info('Gateway analysis complete', {
    gateways: gateways.length,
    summaries: result.summaries.length,
    failures: result.failures.length,
    windowStart: window.start.toISOString(),
    windowEnd: window.end.toISOString(),
  });

  return result;
}
