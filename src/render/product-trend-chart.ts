import type Handlebars from "handlebars";
import { Logger } from "../common/logger";
import type {
    ProductTrend,
    ProductTrendChartData,
    ProductTrendChartOptions
} from "../shared/type/product-trend.type";

const logger = new Logger("ProductTrendChart");

export const DEFAULT_CHART_ID = "productTrendChart";
export const DEFAULT_CHART_TITLE = "Product Production Trend";
export const DEFAULT_CHART_HEIGHT = "h-80";
export const EMPTY_MESSAGE = "No production data for the selected period.";

/** Declarative Chart.js bar configuration, serialised into the page. */
export type BarChartConfig = {
    type: "bar";
    data: ProductTrendChartData;
    options: {
        responsive: boolean;
        maintainAspectRatio: boolean;
        plugins: { legend: { display: boolean; position: "bottom" } };
        scales: {
            y: { beginAtZero: boolean; title: { display: boolean; text: string } };
        };
    };
};

/** Everything the partial template needs; logic stays here. */
export type ProductTrendChartView = {
    chartId: string;
    chartTitle: string;
    chartHeight: string;
    showLegend: boolean;
    isEmpty: boolean;
    emptyMessage: string;
    productCount: number;
    dayCount: number;
    config: BarChartConfig | null;
    /** config as JSON safe to place inside a <script> element, '' when empty */
    configJson: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((v) => typeof v === "number");
}

/** Structural check for values arriving from templates or JSON. */
export function isProductTrend(value: unknown): value is ProductTrend {
    if (!isRecord(value)) return false;
    const chart = value.chart_data;
    if (!isRecord(chart) || !isStringArray(chart.labels)) return false;
    if (
        !Array.isArray(chart.datasets) ||
        !chart.datasets.every(
            (ds) =>
                isRecord(ds) &&
                typeof ds.label === "string" &&
                isNumberArray(ds.data)
        )
    ) {
        return false;
    }
    return (
        isRecord(value.products) &&
        isStringArray(value.date_range) &&
        typeof value.total_products === "number"
    );
}

/** Pads with zeros or cuts so the series has exactly `length` values. */
export function alignToLabels(data: number[], length: number): number[] {
    const aligned = data.slice(0, length).map((v) => (Number.isFinite(v) ? v : 0));
    while (aligned.length < length) aligned.push(0);
    return aligned;
}

/** JSON that cannot close the surrounding <script> element. */
export function scriptSafeJson(value: unknown): string {
    return JSON.stringify(value)
        .replace(/</g, "\\u003c")
        .replace(/>/g, "\\u003e")
        .replace(/&/g, "\\u0026")
        .replace(/\u2028/g, "\\u2028")
        .replace(/\u2029/g, "\\u2029");
}

export function buildProductTrendChart(
    trend: ProductTrend | null | undefined,
    options: ProductTrendChartOptions = {}
): ProductTrendChartView {
    const chartId = options.chart_id || DEFAULT_CHART_ID;
    const chartTitle = options.chart_title ?? DEFAULT_CHART_TITLE;
    const chartHeight = options.chart_height || DEFAULT_CHART_HEIGHT;
    const showLegend = options.show_legend ?? true;

    const base = {
        chartId,
        chartTitle,
        chartHeight,
        showLegend,
        emptyMessage: EMPTY_MESSAGE
    };

    if (
        !trend ||
        trend.total_products === 0 ||
        Object.keys(trend.products).length === 0 ||
        trend.chart_data.datasets.length === 0
    ) {
        return {
            ...base,
            isEmpty: true,
            productCount: 0,
            dayCount: trend ? trend.chart_data.labels.length : 0,
            config: null,
            configJson: ""
        };
    }

    const labels = [...trend.chart_data.labels];
    const datasets = trend.chart_data.datasets.map((ds) => {
        if (ds.data.length !== labels.length) {
            logger.warn(
                `Dataset "${ds.label}" has ${ds.data.length} values for ${labels.length} labels`
            );
        }
        return { ...ds, data: alignToLabels(ds.data, labels.length) };
    });

    const config: BarChartConfig = {
        type: "bar",
        data: { labels, datasets },
        options: {
            responsive: true,
            maintainAspectRatio: false,
            plugins: { legend: { display: showLegend, position: "bottom" } },
            scales: {
                y: { beginAtZero: true, title: { display: true, text: "Good packs" } }
            }
        }
    };

    return {
        ...base,
        isEmpty: false,
        productCount: datasets.length,
        dayCount: labels.length,
        config,
        configJson: scriptSafeJson(config)
    };
}

function readHash(helperOptions: unknown): Record<string, unknown> {
    if (isRecord(helperOptions) && isRecord(helperOptions.hash)) {
        return helperOptions.hash;
    }
    return {};
}

function optionalString(value: unknown): string | undefined {
    return typeof value === "string" ? value : undefined;
}

/** Accepts a boolean or the strings "true"/"false" as templates pass them. */
function optionalBoolean(value: unknown): boolean | undefined {
    if (typeof value === "boolean") return value;
    if (value === "true") return true;
    if (value === "false") return false;
    return undefined;
}

/**
 * Registers `{{{product_trend_chart product_trend=... chart_id="..."}}}`.
 * The trend may also be passed positionally. Anything that is not a
 * ProductTrend renders the empty state.
 */
export function registerProductTrendChart(
    hbs: typeof Handlebars,
    partialSource: string
): void {
    const template = hbs.compile<ProductTrendChartView>(partialSource);

    hbs.registerHelper("product_trend_chart", (...args: unknown[]) => {
        const hash = readHash(args[args.length - 1]);
        const candidate =
            "product_trend" in hash
                ? hash.product_trend
                : args.length > 1
                  ? args[0]
                  : undefined;
        const trend = isProductTrend(candidate) ? candidate : null;
        if (candidate && !trend) {
            logger.warn("product_trend_chart received a value that is not a product trend");
        }

        const view = buildProductTrendChart(trend, {
            chart_id: optionalString(hash.chart_id),
            chart_title: optionalString(hash.chart_title),
            chart_height: optionalString(hash.chart_height),
            show_legend: optionalBoolean(hash.show_legend)
        });
        return new hbs.SafeString(template(view));
    });
}
