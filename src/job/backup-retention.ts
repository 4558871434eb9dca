import { readdir, rm } from "fs/promises";
import { join } from "path";
import { fileTimestamp } from "../common/maintenance-log";

const DAY_MS = 86_400_000;

/** db_YYYYMMDD_HHMMSS.sqlite3.gz */
export const BACKUP_FILE_RE =
    /^db_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.sqlite3\.gz$/;

export function backupFileName(at: Date): string {
    return `db_${fileTimestamp(at)}.sqlite3.gz`;
}

/** UTC time encoded in a backup file name, null for anything else. */
export function backupTime(name: string): Date | null {
    const m = BACKUP_FILE_RE.exec(name);
    if (!m) return null;
    const [, y, mo, d, h, mi, s] = m.map(Number);
    const at = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
    return isNaN(at.getTime()) ? null : at;
}

/**
 * Names of backups older than the retention window, oldest first.
 * A backup exactly `retentionDays` old is kept.
 */
export function expiredBackups(
    names: string[],
    now: Date,
    retentionDays: number
): string[] {
    const cutoff = now.getTime() - retentionDays * DAY_MS;
    return names
        .map((name) => ({ name, at: backupTime(name) }))
        .filter(
            (entry): entry is { name: string; at: Date } =>
                entry.at !== null && entry.at.getTime() < cutoff
        )
        .sort((a, b) => a.at.getTime() - b.at.getTime())
        .map((entry) => entry.name);
}

/** Deletes expired backups from `dir`; other files are never touched. */
export async function pruneBackups(
    dir: string,
    now: Date,
    retentionDays: number
): Promise<string[]> {
    const expired = expiredBackups(await readdir(dir), now, retentionDays);
    for (const name of expired) {
        await rm(join(dir, name), { force: true });
    }
    return expired;
}
