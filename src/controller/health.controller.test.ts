import type { FastifyInstance } from "fastify";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { buildApp } from "../app";
import { APP_VERSION, loadConfig } from "../common/config";

describe("HealthController", () => {
    let dir: string;
    let app: FastifyInstance;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), "health-"));
        process.env.OPS_DB_PATH = join(dir, "missing.sqlite3");
        app = buildApp(loadConfig({}));
    });

    afterAll(async () => {
        await app.close();
        delete process.env.OPS_DB_PATH;
        await rm(dir, { recursive: true, force: true });
    });

    it("answers 503 when the database cannot be opened", async () => {
        const res = await app.inject({ method: "GET", url: "/health/" });
        expect(res.statusCode).toBe(503);
        expect(res.json()).toMatchObject({ status: "error", version: APP_VERSION });
    });

    it("serves the same answer without the trailing slash", async () => {
        const res = await app.inject({ method: "GET", url: "/health" });
        expect(res.statusCode).toBe(503);
    });
});
