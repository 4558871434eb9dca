#!/usr/bin/env node
import { join } from "path";
import { parseArgs } from "util";
import { startServer } from "./app";
import { loadConfig, type OpsConfig } from "./common/config";
import { errorMessage, InvalidQueryError } from "./common/errors";
import { Logger } from "./common/logger";
import { MaintenanceLog } from "./common/maintenance-log";
import { onShutdown, shutdown } from "./common/shutdown";
import { BackupJob } from "./job/backup.job";
import { DeployJob } from "./job/deploy.job";
import { HealthCheckJob } from "./job/health-check.job";
import { pdfFollowUp, SetupPdfJob } from "./job/setup-pdf.job";
import { formatSections, TroubleshootJob } from "./job/troubleshoot.job";
import { CONFIG_KINDS, type ConfigKind, ConfigRenderer, isConfigKind } from "./provision/config.render";
import { loadPackageLists } from "./provision/packages";
import { isProvisionState, PROVISION_STATES, type ProvisionState, provisionPlan } from "./provision/provision.plan";
import { FileProvisionStore, FsFileWriter, ProvisionRunner } from "./provision/provision.runner";
import { ResendAlertServiceProvider } from "./shared/service-provider/alert.service.provider";
import { CommandServiceProvider } from "./shared/service-provider/command.service.provider";
import { DiskServiceProvider } from "./shared/service-provider/disk.service.provider";
import { HttpProbeServiceProvider } from "./shared/service-provider/http-probe.service.provider";
import { SqliteServiceProvider } from "./shared/service-provider/sqlite.service.provider";

const logger = new Logger("Cli");

export const USAGE = `Usage: prodtrack-ops <command> [options]

Commands:
  health-check                      probe the application, restart it when down
  backup                            snapshot, verify, compress and prune the database
  deploy                            pull, migrate, build, restart and probe
  setup-pdf                         install the OS packages PDF reports need
  provision [--target <state>] [--dry-run]
                                    walk the host through the provisioning states
  render-config <kind>              print a rendered ${CONFIG_KINDS.join("|")} file
  troubleshoot                      print service diagnostics
  serve                             start the report console`;

export type CliCommand =
    | { name: "health-check" }
    | { name: "backup" }
    | { name: "deploy" }
    | { name: "setup-pdf" }
    | { name: "provision"; target: ProvisionState; dryRun: boolean }
    | { name: "render-config"; kind: ConfigKind }
    | { name: "troubleshoot" }
    | { name: "serve" }
    | { name: "help" };

export function parseCommandLine(argv: string[]): CliCommand {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            target: { type: "string" },
            "dry-run": { type: "boolean", default: false },
            help: { type: "boolean", short: "h", default: false }
        }
    });

    const [name, ...rest] = positionals;
    if (values.help || name === undefined || name === "help") return { name: "help" };

    switch (name) {
        case "health-check":
        case "backup":
        case "deploy":
        case "setup-pdf":
        case "troubleshoot":
        case "serve":
            if (rest.length) throw new InvalidQueryError(`${name} takes no arguments`);
            return { name };
        case "provision": {
            const target = values.target ?? "hardened";
            if (!isProvisionState(target)) {
                throw new InvalidQueryError(
                    `unknown state "${target}", expected one of ${PROVISION_STATES.join(", ")}`
                );
            }
            return { name, target, dryRun: values["dry-run"] ?? false };
        }
        case "render-config": {
            const [kind] = rest;
            if (kind === undefined || !isConfigKind(kind)) {
                throw new InvalidQueryError(`render-config needs one of ${CONFIG_KINDS.join(", ")}`);
            }
            return { name, kind };
        }
        default:
            throw new InvalidQueryError(`unknown command "${name}"`);
    }
}

function alerts(config: OpsConfig): ResendAlertServiceProvider {
    return new ResendAlertServiceProvider(
        config.django.RESEND_API_KEY,
        config.django.DEFAULT_FROM_EMAIL,
        config.alertTo
    );
}

/** Runs one command and resolves to the process exit code. `serve` resolves null and keeps running. */
export async function runCommand(command: CliCommand, config: OpsConfig): Promise<number | null> {
    const commands = new CommandServiceProvider();

    switch (command.name) {
        case "help":
            process.stdout.write(USAGE + "\n");
            return 0;

        case "health-check": {
            const report = await new HealthCheckJob(
                {
                    url: config.healthUrl,
                    serviceName: config.serviceName,
                    diskPath: config.diskPath,
                    diskThreshold: config.diskThreshold
                },
                {
                    probe: new HttpProbeServiceProvider(config.healthTimeoutMs),
                    disk: new DiskServiceProvider(),
                    commands,
                    alerts: alerts(config),
                    log: new MaintenanceLog(join(config.logDir, "health.log"))
                }
            ).run();
            return report.healthy ? 0 : 1;
        }

        case "backup": {
            const database = new SqliteServiceProvider(config.databasePath);
            onShutdown("database", () => database.close());
            const report = await new BackupJob(
                { backupDir: config.backupDir, retentionDays: config.backupRetentionDays },
                {
                    database,
                    alerts: alerts(config),
                    log: new MaintenanceLog(join(config.logDir, "backup.log"))
                }
            ).run();
            return report.ok ? 0 : 1;
        }

        case "deploy": {
            const report = await new DeployJob(
                {
                    appDir: config.appDir,
                    branch: config.deployBranch,
                    serviceName: config.serviceName,
                    healthUrl: config.healthUrl,
                    settleMs: config.deploySettleMs,
                    django: config.django
                },
                { commands, probe: new HttpProbeServiceProvider(config.healthTimeoutMs) }
            ).run();
            if (!report.ok) {
                process.stdout.write(report.message + "\n");
                return 1;
            }
            process.stdout.write(`Deployment complete (HTTP ${report.status})\n`);
            return 0;
        }

        case "setup-pdf": {
            const report = await new SetupPdfJob(loadPackageLists(config.resourcesDir), commands).run();
            if (report.exitCode === 0) {
                process.stdout.write(
                    "Now run:\n" +
                        pdfFollowUp(config.appDir, config.serviceName).map((c) => `  ${c}\n`).join("")
                );
            }
            return report.exitCode;
        }

        case "provision": {
            const plan = provisionPlan(config, loadPackageLists(config.resourcesDir));
            const runner = new ProvisionRunner(plan, {
                commands,
                store: new FileProvisionStore(config.stateFile),
                files: new FsFileWriter(),
                configs: new ConfigRenderer(join(config.resourcesDir, "templates"), config)
            });
            const report = await runner.run(command.target, command.dryRun);
            if (report.dryRun) {
                process.stdout.write(report.actions.map((a) => a + "\n").join(""));
                return 0;
            }
            if (report.failed) {
                logger.error(`Provisioning stopped at ${report.reached}: ${report.failed.action} failed`);
                const sections = await new TroubleshootJob(config, commands).run();
                process.stdout.write(formatSections(sections) + "\n");
                return 1;
            }
            logger.notice(`Host is at ${report.reached}`);
            return 0;
        }

        case "render-config":
            process.stdout.write(
                new ConfigRenderer(join(config.resourcesDir, "templates"), config).render(command.kind)
            );
            return 0;

        case "troubleshoot": {
            const sections = await new TroubleshootJob(config, commands).run();
            process.stdout.write(formatSections(sections) + "\n");
            return 0;
        }

        case "serve":
            await startServer(config);
            return null;
    }
}

export async function main(argv: string[]): Promise<number | null> {
    let command: CliCommand;
    try {
        command = parseCommandLine(argv);
    } catch (err) {
        process.stderr.write(`${errorMessage(err)}\n\n${USAGE}\n`);
        return 2;
    }
    return runCommand(command, loadConfig());
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then((code) => {
            if (code !== null) void shutdown(code);
        })
        .catch((err) => {
            logger.fatal({ err }, errorMessage(err));
            void shutdown(1);
        });
}
