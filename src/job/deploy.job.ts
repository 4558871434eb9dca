import { setTimeout as sleep } from "timers/promises";
import { join } from "path";
import type { DjangoEnvironment } from "../common/config";
import { CommandError } from "../common/errors";
import { Logger } from "../common/logger";
import { describeCommand, runChecked } from "../shared/service-provider/command.service.provider";
import {
    type HttpProbe,
    statusCode
} from "../shared/service-provider/http-probe.service.provider";
import type { CommandRunner, CommandSpec } from "../shared/type/command.type";
import { restartCommand } from "./health-check.job";

const logger = new Logger("DeployJob");

export type DeploySettings = {
    appDir: string;
    branch: string;
    serviceName: string;
    healthUrl: string;
    settleMs: number;
    django: DjangoEnvironment;
};

export type DeployDeps = {
    commands: CommandRunner;
    probe: HttpProbe;
    wait?: (ms: number) => Promise<unknown>;
};

export type DeployStep = { name: string; spec: CommandSpec };

export type DeployReport =
    | { ok: true; status: string; steps: string[] }
    | { ok: false; failedStep: string; message: string; steps: string[] };

/** Only variables with a value are exported, so an unset secret never blanks an inherited one. */
export function djangoEnv(django: DjangoEnvironment): Record<string, string> {
    return Object.fromEntries(
        Object.entries(django).filter(([, value]) => value !== "")
    );
}

/** manage.py invocation through the app's virtualenv. */
export function manage(
    appDir: string,
    django: DjangoEnvironment,
    ...args: string[]
): CommandSpec {
    return {
        command: join(appDir, "venv", "bin", "python"),
        args: ["manage.py", ...args],
        cwd: appDir,
        env: djangoEnv(django)
    };
}

export function deploySteps(settings: DeploySettings): DeployStep[] {
    const { appDir, django } = settings;
    return [
        {
            name: "pull",
            spec: { command: "git", args: ["pull", "origin", settings.branch], cwd: appDir }
        },
        {
            name: "install",
            spec: {
                command: join(appDir, "venv", "bin", "pip"),
                args: ["install", "-r", "requirements.txt"],
                cwd: appDir
            }
        },
        { name: "migrate", spec: manage(appDir, django, "migrate", "--noinput") },
        { name: "build-css", spec: manage(appDir, django, "tailwind", "build") },
        {
            name: "collectstatic",
            spec: manage(appDir, django, "collectstatic", "--noinput")
        },
        { name: "restart", spec: restartCommand(settings.serviceName) }
    ];
}

/**
 * Runs the deployment steps in order, stops at the first failure, then
 * probes the restarted application. Nothing is rolled back.
 */
export class DeployJob {
    constructor(
        private readonly settings: DeploySettings,
        private readonly deps: DeployDeps
    ) {}

    async run(): Promise<DeployReport> {
        const done: string[] = [];

        for (const step of deploySteps(this.settings)) {
            logger.notice(`[${step.name}] ${describeCommand(step.spec)}`);
            try {
                await runChecked(this.deps.commands, step.spec, step.name);
            } catch (err) {
                if (!(err instanceof CommandError)) throw err;
                logger.error(`Step ${err.stage} failed: ${err.message}`);
                return {
                    ok: false,
                    failedStep: err.stage,
                    message: `Deployment stopped at ${err.stage}: ${err.detail}`,
                    steps: done
                };
            }
            done.push(step.name);
        }

        const wait = this.deps.wait ?? sleep;
        await wait(this.settings.settleMs);

        const probe = await this.deps.probe.get(this.settings.healthUrl);
        const status = statusCode(probe);
        if (probe.status !== 200) {
            logger.error(`Health probe of ${this.settings.healthUrl} answered ${status}`);
            return {
                ok: false,
                failedStep: "health-check",
                message: "Deployment failed health check",
                steps: done
            };
        }

        logger.notice(`Deployment complete, ${this.settings.healthUrl} answered ${status}`);
        return { ok: true, status, steps: done };
    }
}
