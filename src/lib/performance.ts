/**
 * performance.ts — Stage timing for the analysis engine
 *
 * Keeps a rolling window of timings in process. The API server reads the
 * summary for its health check.
 */

// ═══════════════════════════════════════════════════════════
// 1. PERFORMANCE METRICS TYPES
// ═══════════════════════════════════════════════════════════

export interface PerformanceMetric {
    name: string;
    duration: number; // milliseconds
    timestamp: number;
    metadata?: Record<string, unknown>;
}

export interface PerformanceReport {
    totalDuration: number;
    metrics: PerformanceMetric[];
    summary: {
        avgDuration: number;
        maxDuration: number;
        minDuration: number;
        count: number;
    };
}

export interface StageTiming {
    name: string;
    count: number;
    avgDuration: number;
    maxDuration: number;
}

// ═══════════════════════════════════════════════════════════
// 2. PERFORMANCE TRACKER
// ═══════════════════════════════════════════════════════════

const metrics: PerformanceMetric[] = [];
const MAX_METRICS = 200; // Rolling window
const SLOW_STAGE_MS = 100;

export function trackSync<T>(name: string, fn: () => T, metadata?: Record<string, unknown>): T {
    const start = performance.now();
    try {
        return fn();
    } finally {
        recordMetric(name, performance.now() - start, metadata);
    }
}

export async function trackAsync<T>(
    name: string,
    fn: () => Promise<T>,
    metadata?: Record<string, unknown>,
): Promise<T> {
    const start = performance.now();
    try {
        return await fn();
    } finally {
        recordMetric(name, performance.now() - start, metadata);
    }
}

/**
 * Manual timer for spans that do not fit in a single callback
 */
export function createMarker(name: string): {
    stop: (metadata?: Record<string, unknown>) => number;
} {
    const start = performance.now();
    return {
        stop: (metadata?: Record<string, unknown>) => {
            const duration = performance.now() - start;
            recordMetric(name, duration, metadata);
            return duration;
        },
    };
}

function recordMetric(name: string, duration: number, metadata?: Record<string, unknown>): void {
    metrics.push({
        name,
        duration,
        timestamp: Date.now(),
        ...(metadata && { metadata }),
    });

    while (metrics.length > MAX_METRICS) {
        metrics.shift();
    }

    if (process.env.NODE_ENV !== 'production' && duration > SLOW_STAGE_MS) {
        console.debug(`[Perf] ${name}: ${formatDuration(duration)}`, metadata ?? '');
    }
}

// ═══════════════════════════════════════════════════════════
// 3. REPORTING
// ═══════════════════════════════════════════════════════════

export function getPerformanceReport(operationName?: string): PerformanceReport {
    const filtered = operationName ? metrics.filter(m => m.name === operationName) : metrics;

    if (filtered.length === 0) {
        return {
            totalDuration: 0,
            metrics: [],
            summary: { avgDuration: 0, maxDuration: 0, minDuration: 0, count: 0 },
        };
    }

    const durations = filtered.map(m => m.duration);
    const totalDuration = durations.reduce((a, b) => a + b, 0);

    return {
        totalDuration,
        metrics: [...filtered],
        summary: {
            avgDuration: totalDuration / filtered.length,
            maxDuration: Math.max(...durations),
            minDuration: Math.min(...durations),
            count: filtered.length,
        },
    };
}

/** Per-name aggregates of the current window, slowest average first */
export function summarizeStages(): StageTiming[] {
    const byName = new Map<string, number[]>();
    for (const metric of metrics) {
        const durations = byName.get(metric.name) ?? [];
        durations.push(metric.duration);
        byName.set(metric.name, durations);
    }

    return [...byName.entries()]
        .map(([name, durations]) => ({
            name,
            count: durations.length,
            avgDuration: durations.reduce((a, b) => a + b, 0) / durations.length,
            maxDuration: Math.max(...durations),
        }))
        .sort((a, b) => b.avgDuration - a.avgDuration);
}

export function clearMetrics(): void {
    metrics.length = 0;
}

export function getRecentMetrics(count: number = 10): PerformanceMetric[] {
    return metrics.slice(-count);
}

// ═══════════════════════════════════════════════════════════
// 4. MEMORY
// ═══════════════════════════════════════════════════════════

export interface MemoryInfo {
    heapUsed: number;
    heapTotal: number;
    rss: number;
    usagePercent: number;
}

export function getMemoryInfo(): MemoryInfo {
    const { heapUsed, heapTotal, rss } = process.memoryUsage();
    return {
        heapUsed,
        heapTotal,
        rss,
        usagePercent: heapTotal > 0 ? (heapUsed / heapTotal) * 100 : 0,
    };
}

// ═══════════════════════════════════════════════════════════
// 5. FORMATTERS
// ═══════════════════════════════════════════════════════════

export function formatDuration(ms: number): string {
    if (ms < 1) return `${(ms * 1000).toFixed(0)}μs`;
    if (ms < 1000) return `${ms.toFixed(1)}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
    return `${(ms / 60000).toFixed(2)}m`;
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
    if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)}GB`;
}
