/**
 * Access to the Production Tracker SQLite database: production run
 * aggregation for reports and the checkpoint/snapshot protocol for backups
 * @license MIT
 */
import Database from "better-sqlite3";
import { Logger } from "../../common/logger";
import type {
    DailyProductTotal,
    ProductionLine,
    ProductionRunRepository,
    TrendQuery
} from "../type/production.type";

const logger = new Logger("SqliteServiceProvider");

/** Result row of PRAGMA wal_checkpoint. */
export type CheckpointResult = {
    busy: number;
    log: number;
    checkpointed: number;
};

type TotalsRow = {
    date: string;
    product_id: number;
    name: string;
    code: string;
    packs: number;
    runs: number;
};

function isCheckpointResult(row: unknown): row is CheckpointResult {
    if (typeof row !== "object" || row === null) return false;
    return (
        "busy" in row &&
        typeof row.busy === "number" &&
        "log" in row &&
        typeof row.log === "number" &&
        "checkpointed" in row &&
        typeof row.checkpointed === "number"
    );
}

/** The checkpoint/snapshot protocol the backup job relies on. */
export interface DatabaseSnapshotter {
    readonly path: string;
    journalMode(): string;
    checkpoint(): CheckpointResult;
    snapshot(destination: string): Promise<void>;
    verifySnapshot(file: string): string;
}

export class SqliteServiceProvider
    implements ProductionRunRepository, DatabaseSnapshotter
{
    private db: Database.Database | null = null;

    /** Matches the application's PRAGMA busy_timeout. */
    private readonly BUSY_TIMEOUT_MS = 30_000;

    constructor(
        readonly path: string,
        private readonly readOnly = false
    ) {}

    private connection(): Database.Database {
        if (!this.db) {
            this.db = new Database(this.path, {
                fileMustExist: true,
                readonly: this.readOnly,
                timeout: this.BUSY_TIMEOUT_MS
            });
            logger.debug(`Opened ${this.path}${this.readOnly ? " (readonly)" : ""}`);
        }
        return this.db;
    }

    ping(): boolean {
        const row = this.connection().prepare<[], { ok: number }>("SELECT 1 AS ok").get();
        return row?.ok === 1;
    }

    journalMode(): string {
        const mode = this.connection().pragma("journal_mode", { simple: true });
        return String(mode).toLowerCase();
    }

    /**
     * Forces a FULL checkpoint: waits for readers, then copies every WAL
     * frame into the database file. busy=1 means it could not finish.
     */
    checkpoint(): CheckpointResult {
        const row: unknown = this.connection()
            .prepare("PRAGMA wal_checkpoint(FULL)")
            .get();
        if (!isCheckpointResult(row)) {
            throw new Error(`Unexpected wal_checkpoint result: ${JSON.stringify(row)}`);
        }
        return row;
    }

    /**
     * Online, consistent copy through SQLite's backup API; writers are not
     * blocked. The copy is switched to a rollback journal so it is a single
     * self-contained file.
     */
    async snapshot(destination: string): Promise<void> {
        const meta = await this.connection().backup(destination);
        const copy = new Database(destination, { fileMustExist: true });
        try {
            copy.pragma("journal_mode = DELETE");
        } finally {
            copy.close();
        }
        logger.debug(`Snapshot copied ${meta.totalPages} pages to ${destination}`);
    }

    /** Runs PRAGMA quick_check against a snapshot file and returns its verdict ("ok" when sound). */
    verifySnapshot(file: string): string {
        const db = new Database(file, { readonly: true, fileMustExist: true });
        try {
            return String(db.pragma("quick_check", { simple: true }));
        } finally {
            db.close();
        }
    }

    dailyProductTotals(query: TrendQuery): DailyProductTotal[] {
        const rows = this.connection()
            .prepare<{ start: string; end: string; line: number | null }, TotalsRow>(
                `SELECT r.date AS date,
                        p.id AS product_id,
                        p.name AS name,
                        p.product_code AS code,
                        COALESCE(SUM(r.good_products_pack), 0) AS packs,
                        COUNT(r.id) AS runs
                   FROM manufacturing_productionrun r
                   JOIN manufacturing_product p ON p.id = r.product_id
                  WHERE r.date BETWEEN @start AND @end
                    AND (@line IS NULL OR r.production_line_id = @line)
                  GROUP BY r.date, p.id
                  ORDER BY p.name, r.date`
            )
            .all({ start: query.start, end: query.end, line: query.lineId });

        return rows.map((row) => ({
            date: row.date,
            productId: row.product_id,
            name: row.name,
            code: row.code,
            packs: row.packs,
            runs: row.runs
        }));
    }

    productionLines(): ProductionLine[] {
        return this.connection()
            .prepare<[], ProductionLine>(
                `SELECT id, name FROM manufacturing_productionline
                  WHERE is_active = 1 ORDER BY name`
            )
            .all();
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}
