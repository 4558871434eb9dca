/**
 * Nightly database backup: checkpoint, online snapshot, verify, gzip, prune.
 * Each step is checked before the next; success is logged only once all
 * of them completed, failures are logged and alerted.
 * @license MIT
 */
import { createReadStream, createWriteStream } from "fs";
import { mkdir, rm, stat } from "fs/promises";
import { basename, join } from "path";
import { pipeline } from "stream/promises";
import { createGzip } from "zlib";
import { BackupError, errorMessage } from "../common/errors";
import { Logger } from "../common/logger";
import { type Clock, MaintenanceLog, systemClock } from "../common/maintenance-log";
import type { AlertSender } from "../shared/service-provider/alert.service.provider";
import type { DatabaseSnapshotter } from "../shared/service-provider/sqlite.service.provider";
import { backupFileName, pruneBackups } from "./backup-retention";

const logger = new Logger("BackupJob");

export type BackupStage =
    | "prepare"
    | "precondition"
    | "checkpoint"
    | "snapshot"
    | "verify"
    | "compress"
    | "prune";

export type BackupSettings = {
    backupDir: string;
    retentionDays: number;
};

export type BackupDeps = {
    database: DatabaseSnapshotter;
    alerts: AlertSender;
    log: MaintenanceLog;
    clock?: Clock;
};

export type BackupReport =
    | { ok: true; file: string; bytes: number; pruned: string[]; line: string }
    | { ok: false; stage: BackupStage; error: string; line: string };

export class BackupJob {
    private readonly clock: Clock;

    constructor(
        private readonly settings: BackupSettings,
        private readonly deps: BackupDeps
    ) {
        this.clock = deps.clock ?? systemClock;
    }

    async run(): Promise<BackupReport> {
        const { backupDir, retentionDays } = this.settings;
        const { database, log } = this.deps;
        const startedAt = this.clock();
        const archive = join(backupDir, backupFileName(startedAt));
        const snapshot = archive.replace(/\.gz$/, "");
        let stage: BackupStage = "prepare";
        let size = 0;
        let pruned: string[] = [];

        try {
            await mkdir(backupDir, { recursive: true });

            stage = "precondition";
            const mode = database.journalMode();
            if (mode !== "wal") {
                throw new BackupError(
                    `${database.path} is in journal_mode=${mode}, WAL is required for online backups`,
                    stage
                );
            }

            stage = "checkpoint";
            const checkpoint = database.checkpoint();
            if (checkpoint.busy !== 0) {
                throw new BackupError(
                    `checkpoint incomplete (${checkpoint.checkpointed} of ${checkpoint.log} WAL frames copied)`,
                    stage
                );
            }
            logger.info(`Checkpointed ${checkpoint.checkpointed} WAL frames`);

            stage = "snapshot";
            await database.snapshot(snapshot);

            stage = "verify";
            const verdict = database.verifySnapshot(snapshot);
            if (verdict !== "ok") {
                throw new BackupError(`quick_check reported: ${verdict}`, stage);
            }

            stage = "compress";
            await pipeline(
                createReadStream(snapshot),
                createGzip(),
                createWriteStream(archive)
            );
            await rm(snapshot);
            ({ size } = await stat(archive));
            if (size === 0) {
                throw new BackupError(`${basename(archive)} is empty`, stage);
            }

            stage = "prune";
            pruned = await pruneBackups(backupDir, startedAt, retentionDays);
            if (pruned.length) {
                logger.info(`Pruned ${pruned.join(", ")}`);
            }
        } catch (err) {
            return this.fail(stage, err, [snapshot, archive]);
        }

        const line = await log.record(
            `Backup completed: ${basename(archive)} (${size} bytes), pruned ${pruned.length}`
        );
        logger.notice(line);
        return { ok: true, file: archive, bytes: size, pruned, line };
    }

    private async fail(
        stage: BackupStage,
        err: unknown,
        partials: string[]
    ): Promise<BackupReport> {
        const message = errorMessage(err);
        logger.error({ err }, `Backup failed during ${stage}`);

        // a finished archive survives a pruning failure
        const leftovers = stage === "prune" ? partials.slice(0, 1) : partials;
        for (const file of leftovers) {
            await rm(file, { force: true }).catch((rmErr: Error) =>
                logger.error(`Cannot remove ${file}: ${rmErr.message}`)
            );
        }

        const line = await this.deps.log.record(
            `Backup FAILED during ${stage}: ${message}`
        );

        try {
            await this.deps.alerts.send(
                `[prodtrack-ops] Backup of ${basename(this.deps.database.path)} failed`,
                `${line}\n\nDatabase: ${this.deps.database.path}\nBackup directory: ${this.settings.backupDir}`
            );
        } catch (alertErr) {
            logger.error(`Alert delivery failed: ${errorMessage(alertErr)}`);
        }

        return { ok: false, stage, error: message, line };
    }
}
