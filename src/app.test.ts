import Database from "better-sqlite3";
import type { FastifyInstance } from "fastify";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { buildApp } from "./app";
import { APP_VERSION, loadConfig } from "./common/config";

function seed(path: string): void {
    const db = new Database(path);
    db.exec(`
        CREATE TABLE manufacturing_product (id INTEGER PRIMARY KEY, name TEXT NOT NULL, product_code TEXT NOT NULL);
        CREATE TABLE manufacturing_productionline (id INTEGER PRIMARY KEY, name TEXT NOT NULL, is_active INTEGER NOT NULL);
        CREATE TABLE manufacturing_productionrun (
            id INTEGER PRIMARY KEY,
            date TEXT NOT NULL,
            product_id INTEGER NOT NULL,
            production_line_id INTEGER NOT NULL,
            good_products_pack INTEGER NOT NULL
        );
        INSERT INTO manufacturing_product VALUES (1, 'Widget', 'W-1'), (2, 'Bolt', 'B-9');
        INSERT INTO manufacturing_productionline VALUES (1, 'Line B', 1), (2, 'Line A', 1), (3, 'Old line', 0);
        INSERT INTO manufacturing_productionrun (date, product_id, production_line_id, good_products_pack) VALUES
            ('2026-10-12', 1, 1, 30),
            ('2026-10-12', 1, 2, 10),
            ('2026-10-13', 2, 1, 15);
    `);
    db.close();
}

describe("console server", () => {
    let dir: string;
    let app: FastifyInstance;

    beforeAll(async () => {
        vi.useFakeTimers({ toFake: ["Date"] });
        vi.setSystemTime(new Date("2026-10-18T10:00:00Z"));
        dir = await mkdtemp(join(tmpdir(), "console-"));
        const dbPath = join(dir, "db.sqlite3");
        seed(dbPath);
        process.env.OPS_DB_PATH = dbPath;
        app = buildApp(loadConfig({}));
    });

    afterAll(async () => {
        await app.close();
        delete process.env.OPS_DB_PATH;
        vi.useRealTimers();
        await rm(dir, { recursive: true, force: true });
    });

    it("redirects the root to the report", async () => {
        const res = await app.inject({ method: "GET", url: "/" });
        expect(res.statusCode).toBe(302);
        expect(res.headers.location).toBe("/reports/product-trend");
    });

    it("answers the health endpoint while the database responds", async () => {
        const res = await app.inject({ method: "GET", url: "/health/" });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ status: "ok", database: "ok", version: APP_VERSION });
    });

    it("serves the trend as JSON", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?start=2026-10-12&end=2026-10-13",
            headers: { accept: "application/json" }
        });

        expect(res.statusCode).toBe(200);
        const body = res.json();
        expect(body.chart_data.labels).toEqual(["2026-10-12", "2026-10-13"]);
        expect(body.chart_data.datasets.map((ds: { data: number[] }) => ds.data)).toEqual([
            [0, 15],
            [40, 0]
        ]);
        expect(body.total_products).toBe(2);
    });

    it("defaults to the seven days ending today", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend",
            headers: { accept: "application/json" }
        });
        expect(res.statusCode).toBe(200);
        expect(res.json().chart_data.labels).toEqual([
            "2026-10-12",
            "2026-10-13",
            "2026-10-14",
            "2026-10-15",
            "2026-10-16",
            "2026-10-17",
            "2026-10-18"
        ]);
    });

    it("renders the chart page with the selected line", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?start=2026-10-12&end=2026-10-13&line=1"
        });

        expect(res.statusCode).toBe(200);
        expect(res.headers["content-type"]).toContain("text/html");
        expect(res.body).toContain(
            '<h3 class="text-lg font-semibold text-gray-800 mb-3">Product Production Trend (2026-10-12 to 2026-10-13)</h3>'
        );
        expect(res.body).toContain('<canvas id="productTrendChart" data-products="2" data-days="2"></canvas>');
        expect(res.body).toContain('<option value="2" >Line A</option>');
        expect(res.body).toContain('<option value="1" selected>Line B</option>');
        expect(res.body).not.toContain("Old line");
    });

    it("renders the empty state when nothing was produced", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?start=2026-09-01&end=2026-09-02"
        });
        expect(res.body).toContain("<p>No production data for the selected period.</p>");
        expect(res.body).not.toContain("<canvas");
    });

    it("rejects an invalid end date with 400", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?end=2026-13-01"
        });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'Invalid end date "2026-13-01"' });
    });

    it("names the start date when only the start is invalid", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?start=2026-02-30&end=2026-03-05"
        });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'Invalid start date "2026-02-30"' });
    });

    it("rejects a reversed range with 400", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?start=2026-10-13&end=2026-10-12"
        });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: "End date 2026-10-12 is before start date 2026-10-13" });
    });

    it("rejects a production line that is not a number", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/reports/product-trend?line=abc"
        });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'Invalid production line "abc"' });
    });
});
