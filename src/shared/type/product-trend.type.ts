/**
 * The chart-ready product trend handed to the chart partial.
 * Field names are snake_case because templates address them directly.
 */

/** One bar series, positionally aligned with `ProductTrendChartData.labels`. */
export type ProductTrendDataset = {
    label: string;
    data: number[];
    backgroundColor: string;
    borderColor: string;
    borderWidth: number;
};

export type ProductTrendChartData = {
    labels: string[];
    datasets: ProductTrendDataset[];
};

export type ProductMetrics = {
    name: string;
    code: string;
    total_packs: number;
    run_count: number;
    /** YYYY-MM-DD → good packs; every day of the range is present. */
    daily_packs: Record<string, number>;
};

export type ProductTrend = {
    chart_data: ProductTrendChartData;
    /** product id → metrics */
    products: Record<string, ProductMetrics>;
    date_range: string[];
    total_products: number;
};

/** Display overrides accepted by the `product_trend_chart` helper. */
export type ProductTrendChartOptions = {
    chart_id?: string;
    chart_title?: string;
    chart_height?: string;
    show_legend?: boolean;
};
