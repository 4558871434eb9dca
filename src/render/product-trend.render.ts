import { Controller, Get, Inject } from "@albertoielpo/ielpify";
import "@fastify/view";
import type { FastifyReply, FastifyRequest } from "fastify";
import { APP_VERSION as version } from "../common/config";
import { InvalidQueryError } from "../common/errors";
import { Logger } from "../common/logger";
import { ReportDatabaseServiceProvider } from "../shared/service-provider/report-database.service.provider";
import {
    isIsoDate,
    ProductionCalculationService
} from "../shared/service/production-calculation.service";
import type { ProductTrend } from "../shared/type/product-trend.type";
import type { ProductionLine } from "../shared/type/production.type";

const logger = new Logger("ProductTrendRender");

type TrendQuery = {
    Querystring: { start?: string; end?: string; line?: string };
};

/** View model for resources/views/product-trend.hbs. */
export type ProductTrendPageModel = {
    start: string;
    end: string;
    lineId: number | null;
    lines: ProductionLine[];
    title: string;
    trend: ProductTrend;
    version: string;
};

export type ErrorResponse = { error: string };

/** Default window is the seven days ending today, like the weekly summary. */
const DEFAULT_DAYS = 7;

@Controller("reports")
export class ProductTrendRender {
    private readonly calc: ProductionCalculationService;

    constructor(
        @Inject(ReportDatabaseServiceProvider)
        private readonly rdb: ReportDatabaseServiceProvider
    ) {
        this.calc = new ProductionCalculationService(rdb);
        logger.notice("ProductTrendRender init");
    }

    private parseDate(field: "start" | "end", raw: string): string {
        if (!isIsoDate(raw)) {
            throw new InvalidQueryError(`Invalid ${field} date "${raw}"`);
        }
        return raw;
    }

    private parseLine(raw?: string): number | null {
        if (raw === undefined || raw === "") return null;
        if (!/^\d+$/.test(raw)) {
            throw new InvalidQueryError(`Invalid production line "${raw}"`);
        }
        return Number(raw);
    }

    @Get("product-trend")
    async index(req: FastifyRequest<TrendQuery>, res: FastifyReply) {
        let vm: ProductTrendPageModel;
        try {
            const end = this.parseDate(
                "end",
                req.query.end || new Date().toISOString().slice(0, 10)
            );
            const start = req.query.start
                ? this.parseDate("start", req.query.start)
                : new Date(Date.parse(`${end}T00:00:00Z`) - (DEFAULT_DAYS - 1) * 86_400_000)
                      .toISOString()
                      .slice(0, 10);
            const lineId = this.parseLine(req.query.line);
            vm = {
                start,
                end,
                lineId,
                lines: this.rdb.productionLines(),
                title: `Product Production Trend (${start} to ${end})`,
                trend: this.calc.calculateProductTrend(start, end, lineId),
                version
            };
        } catch (err) {
            if (err instanceof InvalidQueryError) {
                const body: ErrorResponse = { error: err.message };
                return res.code(400).send(body);
            }
            throw err;
        }

        const accept = req.headers.accept
            ? req.headers.accept.toLowerCase()
            : "";
        if (accept === "application/json") {
            return res.send(vm.trend);
        }

        return res.view("product-trend", vm);
    }
}
