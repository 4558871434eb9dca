/** Good packs of one product on one day, summed over its production runs. */
export type DailyProductTotal = {
    date: string;
    productId: number;
    name: string;
    code: string;
    packs: number;
    runs: number;
};

export type ProductionLine = { id: number; name: string };

export type TrendQuery = {
    start: string;
    end: string;
    lineId: number | null;
};

export interface ProductionRunRepository {
    dailyProductTotals(query: TrendQuery): DailyProductTotal[];
    productionLines(): ProductionLine[];
}
