import { readFileSync } from "fs";
import Handlebars from "handlebars";
import { join } from "path";
import { registerProductTrendChart } from "./product-trend-chart";

/**
 * Isolated Handlebars environment for the console pages. Helpers are
 * registered here so pages and tests render through the same setup.
 */
export function createViewEngine(viewsDir: string): typeof Handlebars {
    const hbs = Handlebars.create();

    hbs.registerHelper("eq", (a: unknown, b: unknown) => a === b);
    hbs.registerHelper(
        "gt",
        (a: unknown, b: unknown) => Number(a) > Number(b)
    );

    registerProductTrendChart(
        hbs,
        readFileSync(join(viewsDir, "partials", "product_trend_chart.hbs"), "utf8")
    );

    return hbs;
}
