import { Controller, Get, Inject } from "@albertoielpo/ielpify";
import type { FastifyReply, FastifyRequest } from "fastify";
import { APP_VERSION as version } from "../common/config";
import { errorMessage } from "../common/errors";
import { Logger } from "../common/logger";
import { ReportDatabaseServiceProvider } from "../shared/service-provider/report-database.service.provider";

const logger = new Logger("HealthController");

export type HealthResponse = {
    status: "ok" | "error";
    database: string;
    version: string;
};

/**
 * GET /health/, proxied by Nginx with access logging off. 200 while the
 * database answers, 503 otherwise.
 */
@Controller("health")
export class HealthController {
    constructor(
        @Inject(ReportDatabaseServiceProvider)
        private readonly database: ReportDatabaseServiceProvider
    ) {
        logger.notice("HealthController init");
    }

    @Get("")
    async health(_req: FastifyRequest, res: FastifyReply) {
        let response: HealthResponse;
        try {
            const ok = this.database.ping();
            response = { status: ok ? "ok" : "error", database: ok ? "ok" : "no answer", version };
        } catch (err) {
            logger.error({ err }, "Database ping failed");
            response = { status: "error", database: errorMessage(err), version };
        }
        return res.code(response.status === "ok" ? 200 : 503).send(response);
    }
}
