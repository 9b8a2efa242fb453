/**
 * Wall-clock timing and sample statistics for comparing search strategies
 */

export interface Timed<T> {
    result: T;
    elapsedMs: number;
}

export function timeRun<T>(fn: () => T): Timed<T> {
    const start = performance.now();
    const result = fn();
    return { result, elapsedMs: performance.now() - start };
}

export interface SampleSummary {
    count: number;
    mean: number;
    p50: number;
    p90: number;
    min: number;
    max: number;
    stdDev: number;
}

/**
 * Summary statistics; quantiles pick the nearest lower rank.
 * An empty sample summarizes to zeros.
 */
export function summarize(values: readonly number[]): SampleSummary {
    if (values.length === 0) {
        return { count: 0, mean: 0, p50: 0, p90: 0, min: 0, max: 0, stdDev: 0 };
    }

    const sorted = values.slice().sort((a, b) => a - b);
    const pick = (quantile: number): number => {
        const idx = Math.min(sorted.length - 1, Math.max(0, Math.floor((sorted.length - 1) * quantile)));
        return sorted[idx];
    };
    const mean = sorted.reduce((sum, v) => sum + v, 0) / sorted.length;
    const variance = sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / sorted.length;

    return {
        count: sorted.length,
        mean,
        p50: pick(0.5),
        p90: pick(0.9),
        min: sorted[0],
        max: sorted[sorted.length - 1],
        stdDev: Math.sqrt(variance),
    };
}

export interface HistogramBin {
    from: number;
    to: number;
    count: number;
}

/**
 * Equal-width bins from min to max; the last bin includes max
 */
export function histogram(values: readonly number[], bins: number): HistogramBin[] {
    if (values.length === 0 || bins < 1) return [];

    const min = Math.min(...values);
    const max = Math.max(...values);
    const width = (max - min) / bins || 1;

    const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
        from: min + i * width,
        to: min + (i + 1) * width,
        count: 0,
    }));
    for (const v of values) {
        const idx = Math.min(bins - 1, Math.floor((v - min) / width));
        result[idx].count++;
    }
    return result;
}

export function formatSummary(label: string, s: SampleSummary, unit = "ms"): string {
    return [
        `${label}:`,
        `n=${s.count}`,
        `mean ${s.mean.toFixed(1)}${unit}`,
        `p50 ${s.p50.toFixed(1)}${unit}`,
        `p90 ${s.p90.toFixed(1)}${unit}`,
        `min ${s.min.toFixed(1)}${unit}`,
        `max ${s.max.toFixed(1)}${unit}`,
        `sd ${s.stdDev.toFixed(1)}${unit}`,
    ].join(" ");
}
