/**
 * Cron-driven application probe: restarts the service on a failed check
 * and warns when the data partition fills up
 * @license MIT
 */
import { CommandError, errorMessage } from "../common/errors";
import { Logger } from "../common/logger";
import { MaintenanceLog } from "../common/maintenance-log";
import type { AlertSender } from "../shared/service-provider/alert.service.provider";
import { runChecked } from "../shared/service-provider/command.service.provider";
import type { DiskUsageReader } from "../shared/service-provider/disk.service.provider";
import {
    type HttpProbe,
    statusCode
} from "../shared/service-provider/http-probe.service.provider";
import type { CommandRunner, CommandSpec } from "../shared/type/command.type";

const logger = new Logger("HealthCheckJob");

export type HealthCheckSettings = {
    url: string;
    serviceName: string;
    diskPath: string;
    /** Warn when usage is strictly above this percentage. */
    diskThreshold: number;
};

export type HealthCheckDeps = {
    probe: HttpProbe;
    disk: DiskUsageReader;
    commands: CommandRunner;
    alerts: AlertSender;
    log: MaintenanceLog;
};

export type HealthCheckReport = {
    healthy: boolean;
    /** "200", "503", or "000" when nothing answered */
    status: string;
    restarted: boolean;
    restartFailed: boolean;
    diskUsage: number | null;
    diskWarning: boolean;
    lines: string[];
};

export function restartCommand(serviceName: string): CommandSpec {
    return { command: "sudo", args: ["systemctl", "restart", serviceName] };
}

export class HealthCheckJob {
    constructor(
        private readonly settings: HealthCheckSettings,
        private readonly deps: HealthCheckDeps
    ) {}

    /** One probe, at most one restart, at most one disk warning. Never retries. */
    async run(): Promise<HealthCheckReport> {
        const { url, serviceName } = this.settings;
        const { probe, log } = this.deps;
        const lines: string[] = [];

        const result = await probe.get(url);
        const status = statusCode(result);
        const healthy = result.status === 200;
        let restarted = false;
        let restartFailed = false;

        if (healthy) {
            lines.push(await log.record(`Health check passed (HTTP ${status})`));
        } else {
            logger.warn(
                `${url} answered ${status}${result.error ? ` (${result.error})` : ""}`
            );
            lines.push(
                await log.record(
                    `Health check failed (HTTP ${status}), restarting ${serviceName}`
                )
            );
            const failure = await this.restart();
            restarted = failure === null;
            restartFailed = !restarted;
            if (failure !== null) {
                lines.push(
                    await log.record(`Restart of ${serviceName} failed: ${failure}`)
                );
            }
        }

        const diskUsage = await this.readDiskUsage();
        const diskWarning =
            diskUsage !== null && diskUsage > this.settings.diskThreshold;
        if (diskWarning) {
            lines.push(
                await log.record(
                    `WARNING: Disk usage at ${diskUsage}% on ${this.settings.diskPath}`
                )
            );
        }

        return { healthy, status, restarted, restartFailed, diskUsage, diskWarning, lines };
    }

    /** Returns null on success, otherwise what went wrong. */
    private async restart(): Promise<string | null> {
        const spec = restartCommand(this.settings.serviceName);
        try {
            await runChecked(this.deps.commands, spec, "restart");
        } catch (err) {
            if (!(err instanceof CommandError)) throw err;
            logger.error(err.message);
            await this.alert(
                `[prodtrack-ops] ${this.settings.serviceName} is down and could not be restarted`,
                `Health check of ${this.settings.url} failed and ${err.message}\n\n${err.stderr.trim()}`
            );
            return err.detail;
        }
        logger.notice(`Restarted ${this.settings.serviceName}`);
        return null;
    }

    private async readDiskUsage(): Promise<number | null> {
        try {
            return await this.deps.disk.usagePercent(this.settings.diskPath);
        } catch (err) {
            logger.error(`Cannot read disk usage of ${this.settings.diskPath}: ${errorMessage(err)}`);
            return null;
        }
    }

    private async alert(subject: string, text: string): Promise<void> {
        try {
            await this.deps.alerts.send(subject, text);
        } catch (err) {
            logger.error(`Alert delivery failed: ${errorMessage(err)}`);
        }
    }
}
