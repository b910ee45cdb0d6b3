/**
 * Request metric types
 */

/**
 * One completed request against an endpoint
 */
export interface RequestMetricSample {
  /** Completion timestamp (ms since epoch) */
  timestamp: number;

  endpointId: string;

  /** End-to-end latency in milliseconds */
  latencyMs: number;

  success: boolean;

  /** Tokens consumed by the request (prompt + completion) */
  tokens: number;
}

/**
 * Rolling aggregate over an endpoint's samples inside one time window
 */
export interface AggregateWindow {
  endpointId: string;

  /** Window bounds (ms since epoch) */
  windowStart: number;
  windowEnd: number;

  sampleCount: number;
  successCount: number;
  errorCount: number;

  /** Error rate (0.0-1.0) */
  errorRate: number;

  // Latency metrics (milliseconds)
  latency: {
    mean: number;
    p50: number;
    p95: number;
    p99: number;
    max: number;
  };

  // Throughput metrics
  throughput: {
    requestsPerSecond: number;
    tokensPerSecond: number;
  };

  /** Tokens consumed inside the window */
  totalTokens: number;

  /** totalTokens × cost-per-token */
  derivedCost: number;
}
