import "reflect-metadata";
import { registerController } from "@albertoielpo/ielpify";
import fastifyStatic from "@fastify/static";
import fastifyView from "@fastify/view";
import Fastify, { type FastifyInstance } from "fastify";
import { join } from "path";
import { APP_VERSION as version, loadConfig, type OpsConfig } from "./common/config";
import { Logger } from "./common/logger";
import { setFastifyInstance, shutdown } from "./common/shutdown";
import { HealthController } from "./controller/health.controller";
import { ProductTrendRender } from "./render/product-trend.render";
import { createViewEngine } from "./render/view-engine";

/** Builds the console server without listening, so tests can inject requests. */
export function buildApp(config: OpsConfig): FastifyInstance {
    // Nginx proxies /health/ with the slash; the route is declared without it
    const fastify = Fastify({ logger: Logger.config, ignoreTrailingSlash: true });
    fastify.log.level = process.env.LOG_LEVEL || "notice";

    // static assets (chart bootstrap script)
    fastify.register(fastifyStatic, {
        root: join(config.resourcesDir, "assets"),
        prefix: "/assets/"
    });

    // SSR view engine: Handlebars
    const viewsDir = join(config.resourcesDir, "views");
    fastify.register(fastifyView, {
        engine: { handlebars: createViewEngine(viewsDir) },
        root: viewsDir
    });

    fastify.get("/", (_, res) => res.redirect("/reports/product-trend"));

    // Singletons
    registerController(fastify, HealthController);
    registerController(fastify, ProductTrendRender);

    return fastify;
}

export async function startServer(config: OpsConfig = loadConfig()): Promise<FastifyInstance> {
    const fastify = buildApp(config);
    setFastifyInstance(fastify);

    process.on("SIGTERM", () => {
        void shutdown(0);
    });

    const addr = await fastify.listen({ port: config.consolePort, host: "0.0.0.0" });
    fastify.log.notice(`Server listening at ${addr}. Version ${version}`);
    return fastify;
}

if (require.main === module) {
    startServer().catch((err) => {
        new Logger("App").fatal({ err }, "Server failed to start");
        void shutdown(1);
    });
}
