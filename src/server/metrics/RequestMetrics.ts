import { METRICS_SAMPLE_LIMIT } from '../../shared/constants';

export interface PerformanceStats {
  uptime: number;
  totalRequests: number;
  errorCount: number;
  avgResponseTime: number;
  memoryUsage: number;
  activeGames: number;
  activeRooms: number;
}

/**
 * Request counters for the /api/performance endpoint. Keeps only the most
 * recent response times.
 */
export class RequestMetrics {
  private readonly startedAt: number;
  private readonly responseTimes: number[] = [];
  private totalRequests = 0;
  private errorCount = 0;

  constructor(
    private readonly now: () => number = Date.now,
    private readonly sampleLimit: number = METRICS_SAMPLE_LIMIT
  ) {
    this.startedAt = now();
  }

  recordRequest(): void {
    this.totalRequests++;
  }

  recordResponseTime(ms: number): void {
    this.responseTimes.push(ms);
    if (this.responseTimes.length > this.sampleLimit) {
      this.responseTimes.splice(0, this.responseTimes.length - this.sampleLimit);
    }
  }

  recordError(): void {
    this.errorCount++;
  }

  averageResponseTime(): number {
    if (this.responseTimes.length === 0) return 0;
    return this.responseTimes.reduce((sum, ms) => sum + ms, 0) / this.responseTimes.length;
  }

  snapshot(activeGames: number, activeRooms: number): PerformanceStats {
    return {
      uptime: (this.now() - this.startedAt) / 1000,
      totalRequests: this.totalRequests,
      errorCount: this.errorCount,
      avgResponseTime: this.averageResponseTime(),
      memoryUsage: process.memoryUsage().rss / (1024 * 1024),
      activeGames,
      activeRooms,
    };
  }
}
