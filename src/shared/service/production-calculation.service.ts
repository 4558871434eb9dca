import { InvalidQueryError } from "../../common/errors";
import { Logger } from "../../common/logger";
import type {
    ProductMetrics,
    ProductTrend,
    ProductTrendDataset
} from "../type/product-trend.type";
import type {
    DailyProductTotal,
    ProductionRunRepository
} from "../type/production.type";

const logger = new Logger("ProductionCalculationService");

const DAY_MS = 86_400_000;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Longest range a single trend may cover. */
export const MAX_TREND_DAYS = 366;

/** Bar colours, cycled per product in dataset order. */
const PALETTE: ReadonlyArray<readonly [number, number, number]> = [
    [59, 130, 246],
    [16, 185, 129],
    [245, 158, 11],
    [239, 68, 68],
    [139, 92, 246],
    [236, 72, 153],
    [20, 184, 166],
    [107, 114, 128]
];

export function isIsoDate(value: string): boolean {
    if (!ISO_DATE_RE.test(value)) return false;
    const d = new Date(`${value}T00:00:00Z`);
    return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/** Every calendar day from start to end, inclusive, as YYYY-MM-DD. */
export function dateRange(start: string, end: string): string[] {
    const first = Date.parse(`${start}T00:00:00Z`);
    const last = Date.parse(`${end}T00:00:00Z`);
    const days: string[] = [];
    for (let t = first; t <= last; t += DAY_MS) {
        days.push(new Date(t).toISOString().slice(0, 10));
    }
    return days;
}

/**
 * Turns per-day product totals into the chart-ready trend. Days without
 * production are zero in every series, so each dataset has one value per
 * label. Totals dated outside `dates` are ignored.
 */
export function buildProductTrend(
    dates: string[],
    totals: DailyProductTotal[]
): ProductTrend {
    const position = new Map(dates.map((d, i) => [d, i]));
    const byProduct = new Map<
        number,
        { metrics: ProductMetrics; data: number[] }
    >();

    for (const total of totals) {
        const i = position.get(total.date);
        if (i === undefined) continue;

        let entry = byProduct.get(total.productId);
        if (!entry) {
            entry = {
                metrics: {
                    name: total.name,
                    code: total.code,
                    total_packs: 0,
                    run_count: 0,
                    daily_packs: Object.fromEntries(dates.map((d) => [d, 0]))
                },
                data: dates.map(() => 0)
            };
            byProduct.set(total.productId, entry);
        }

        entry.data[i] += total.packs;
        entry.metrics.daily_packs[total.date] += total.packs;
        entry.metrics.total_packs += total.packs;
        entry.metrics.run_count += total.runs;
    }

    const ordered = [...byProduct.entries()].sort(
        ([idA, a], [idB, b]) =>
            a.metrics.name.localeCompare(b.metrics.name) || idA - idB
    );

    const datasets: ProductTrendDataset[] = ordered.map(([, entry], n) => {
        const [r, g, b] = PALETTE[n % PALETTE.length];
        return {
            label: entry.metrics.name,
            data: entry.data,
            backgroundColor: `rgba(${r}, ${g}, ${b}, 0.7)`,
            borderColor: `rgb(${r}, ${g}, ${b})`,
            borderWidth: 1
        };
    });

    const products: Record<string, ProductMetrics> = {};
    for (const [id, entry] of ordered) {
        products[String(id)] = entry.metrics;
    }

    return {
        chart_data: { labels: [...dates], datasets },
        products,
        date_range: [...dates],
        total_products: ordered.length
    };
}

export class ProductionCalculationService {
    constructor(private readonly runs: ProductionRunRepository) {}

    /**
     * Good packs per product per day over [start, end], optionally for one
     * production line. Recomputed on every call.
     */
    calculateProductTrend(
        start: string,
        end: string,
        lineId: number | null = null
    ): ProductTrend {
        if (!isIsoDate(start) || !isIsoDate(end)) {
            throw new InvalidQueryError(
                `Dates must be YYYY-MM-DD (got "${start}" and "${end}")`
            );
        }
        if (end < start) {
            throw new InvalidQueryError(`End date ${end} is before start date ${start}`);
        }

        const dates = dateRange(start, end);
        if (dates.length > MAX_TREND_DAYS) {
            throw new InvalidQueryError(
                `Range of ${dates.length} days exceeds ${MAX_TREND_DAYS}`
            );
        }

        const totals = this.runs.dailyProductTotals({ start, end, lineId });
        const trend = buildProductTrend(dates, totals);
        logger.debug(
            `Trend ${start}..${end}${lineId === null ? "" : ` line ${lineId}`}: ${trend.total_products} products`
        );
        return trend;
    }
}
