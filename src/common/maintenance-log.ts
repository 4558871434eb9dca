import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { errorMessage } from "./errors";
import { Logger } from "./logger";

const logger = new Logger("MaintenanceLog");

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** "YYYY-MM-DD HH:MM:SS" in UTC. */
export function logTimestamp(d: Date): string {
    return d.toISOString().replace("T", " ").slice(0, 19);
}

/** "YYYYMMDD_HHMMSS" in UTC, used in backup file names. */
export function fileTimestamp(d: Date): string {
    return d
        .toISOString()
        .slice(0, 19)
        .replace(/[-:]/g, "")
        .replace("T", "_");
}

/**
 * Append-only text log kept next to the cron jobs (health.log, backup.log).
 * One line per event, prefixed with a UTC timestamp. Rotation is left to
 * logrotate.
 */
export class MaintenanceLog {
    constructor(
        readonly file: string,
        private readonly clock: Clock = systemClock
    ) {}

    /**
     * Appends one line and returns it. A failed write is reported on the
     * process log instead of thrown, so the caller's next step still runs.
     */
    async record(message: string): Promise<string> {
        const line = `${logTimestamp(this.clock())} - ${message}`;
        try {
            await mkdir(dirname(this.file), { recursive: true });
            await appendFile(this.file, line + "\n", "utf8");
        } catch (err) {
            logger.error(`Cannot write ${this.file}: ${errorMessage(err)}`);
            logger.warn(line);
        }
        return line;
    }
}
