/**
 * Circuit Breaker for AWS API calls
 *
 * Once CloudWatch or EC2 starts throttling, further calls fail fast with
 * CircuitBreakerOpenError until the recovery timeout has elapsed. The breaker
 * never retries and never substitutes a value: callers always see the failure.
 */

import { logger } from './logger.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeout: number;
  monitoringPeriod: number;
  /** Only errors whose name or message contains one of these trip the breaker */
  expectedErrors?: string[];
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerMetrics {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime?: number;
  lastSuccessTime?: number;
  totalRequests: number;
  failureRate: number;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private totalRequests = 0;
  private lastFailureTime?: number;
  private lastSuccessTime?: number;
  private nextAttempt = 0;

  constructor(
    private name: string,
    private config: CircuitBreakerConfig
  ) {}

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.totalRequests++;

    if (this.shouldReset()) {
      this.reset();
    }

    if (this.state === CircuitState.OPEN) {
      if (Date.now() < this.nextAttempt) {
        logger.warn(`Circuit breaker [${this.name}] is OPEN`, {
          nextAttempt: new Date(this.nextAttempt).toISOString(),
          failures: this.failures,
        });
        throw new CircuitBreakerOpenError(this.name, this.nextAttempt);
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    if (oldState === newState) return;
    this.state = newState;

    if (this.config.onStateChange) {
      this.config.onStateChange(this.name, oldState, newState);
    }

    logger.info(`Circuit breaker [${this.name}] state change`, {
      from: oldState,
      to: newState,
    });
  }

  private onSuccess(): void {
    this.successes++;
    this.lastSuccessTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.CLOSED);
      this.failures = 0;
      logger.info(`Circuit breaker [${this.name}] recovered`);
    }
  }

  private onFailure(error: unknown): void {
    if (this.config.expectedErrors && this.config.expectedErrors.length > 0) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const errorName = error instanceof Error ? error.name : '';

      const isExpectedError = this.config.expectedErrors.some(expectedError =>
        errorMessage.includes(expectedError) || errorName.includes(expectedError)
      );

      if (!isExpectedError) {
        return;
      }
    }

    this.failures++;
    this.lastFailureTime = Date.now();

    logger.warn(`Circuit breaker [${this.name}] failure`, {
      failures: this.failures,
      threshold: this.config.failureThreshold,
      error: error instanceof Error ? error.message : String(error),
    });

    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.config.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
      this.nextAttempt = Date.now() + this.config.recoveryTimeout;

      logger.error(`Circuit breaker [${this.name}] OPENED`, undefined, {
        failures: this.failures,
        recoveryTimeout: this.config.recoveryTimeout,
        nextAttempt: new Date(this.nextAttempt).toISOString(),
      });
    }
  }

  // Failures older than the monitoring period no longer count, unless the breaker is open
  private shouldReset(): boolean {
    if (!this.lastFailureTime || this.state === CircuitState.OPEN) return false;
    return (Date.now() - this.lastFailureTime) > this.config.monitoringPeriod;
  }

  private reset(): void {
    this.transitionTo(CircuitState.CLOSED);
    this.failures = 0;
    this.lastFailureTime = undefined;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      name: this.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      totalRequests: this.totalRequests,
      failureRate: this.totalRequests > 0
        ? (this.failures / this.totalRequests) * 100
        : 0,
    };
  }

  getState(): CircuitState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  forceClose(): void {
    this.transitionTo(CircuitState.CLOSED);
    this.failures = 0;
  }
}

export class CircuitBreakerOpenError extends Error {
  constructor(
    public readonly serviceName: string,
    public readonly nextAttempt: number
  ) {
    super(`Circuit breaker [${serviceName}] is OPEN. Retry after ${new Date(nextAttempt).toISOString()}`);
    this.name = 'CircuitBreakerOpenError';
  }
}

// Registry shared by every client of a process
const circuitBreakers = new Map<string, CircuitBreaker>();

export function getCircuitBreaker(name: string, config: CircuitBreakerConfig): CircuitBreaker {
  let breaker = circuitBreakers.get(name);
  if (!breaker) {
    breaker = new CircuitBreaker(name, config);
    circuitBreakers.set(name, breaker);
  }
  return breaker;
}

// Reset all circuit breakers (for testing)
export function resetAllCircuitBreakers(): void {
  circuitBreakers.forEach(cb => cb.forceClose());
}

// ============================================================================
// AWS-SPECIFIC CONFIGURATIONS
// ============================================================================

export const AWS_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeout: 30000, // 30 seconds
  monitoringPeriod: 60000, // 1 minute
  expectedErrors: [
    'Throttling',
    'ThrottlingException',
    'RequestLimitExceeded',
    'ServiceUnavailable',
    'TooManyRequestsException',
    'InternalServiceError',
    'InternalFailure',
  ],
};

export type AwsServiceName = 'cloudwatch' | 'ec2' | 'sts';

export const SERVICE_CONFIGS: Record<AwsServiceName, CircuitBreakerConfig> = {
  // GetMetricStatistics is rate limited per account and region
  cloudwatch: {
    ...AWS_CIRCUIT_BREAKER_CONFIG,
    failureThreshold: 3,
    recoveryTimeout: 60000,
  },
  ec2: {
    ...AWS_CIRCUIT_BREAKER_CONFIG,
    failureThreshold: 5,
    recoveryTimeout: 30000,
  },
  sts: {
    ...AWS_CIRCUIT_BREAKER_CONFIG,
    failureThreshold: 5,
    recoveryTimeout: 30000,
  },
};

export function getAwsCircuitBreaker(serviceName: AwsServiceName): CircuitBreaker {
  return getCircuitBreaker(`aws-${serviceName}`, SERVICE_CONFIGS[serviceName]);
}

/**
 * Execute operation with AWS circuit breaker
 */
export async function withAwsCircuitBreaker<T>(
  serviceName: AwsServiceName,
  operation: () => Promise<T>
): Promise<T> {
  return getAwsCircuitBreaker(serviceName).execute(operation);
}
