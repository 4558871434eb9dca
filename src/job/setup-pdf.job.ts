import { CommandError } from "../common/errors";
import { Logger } from "../common/logger";
import { runChecked } from "../shared/service-provider/command.service.provider";
import type { CommandRunner, CommandSpec } from "../shared/type/command.type";
import type { PackageLists } from "../provision/packages";

const logger = new Logger("SetupPdfJob");

export type SetupPdfReport = {
    exitCode: number;
    completed: string[];
    failed?: string;
};

function aptInstall(packages: string[]): CommandSpec {
    return {
        command: "sudo",
        args: ["DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", ...packages]
    };
}

export function pdfSetupSteps(packages: PackageLists): Array<{ name: string; spec: CommandSpec }> {
    return [
        { name: "Updating package index", spec: { command: "sudo", args: ["apt-get", "update"] } },
        { name: "Installing headless browser dependencies", spec: aptInstall(packages.pdf.browser) },
        { name: "Installing fonts for PDF rendering", spec: aptInstall(packages.pdf.fonts) },
        { name: "Installing PDF engine build dependencies", spec: aptInstall(packages.pdf.engine) }
    ];
}

/** What still has to be done inside the app's virtualenv afterwards. */
export function pdfFollowUp(appDir: string, serviceName: string): string[] {
    return [
        `cd ${appDir}`,
        "source venv/bin/activate",
        "pip install -r requirements.txt",
        "python -m playwright install chromium",
        `sudo systemctl restart ${serviceName}`
    ];
}

/**
 * Installs the OS packages the PDF reports need. Safe to re-run; stops at
 * the first failing apt call and hands back its exit code.
 */
export class SetupPdfJob {
    constructor(
        private readonly packages: PackageLists,
        private readonly commands: CommandRunner
    ) {}

    async run(): Promise<SetupPdfReport> {
        const completed: string[] = [];
        for (const step of pdfSetupSteps(this.packages)) {
            logger.notice(step.name);
            try {
                await runChecked(this.commands, step.spec, step.name);
            } catch (err) {
                if (!(err instanceof CommandError)) throw err;
                logger.error(err.message);
                return {
                    exitCode: err.exitCode ?? 1,
                    completed,
                    failed: err.stage
                };
            }
            completed.push(step.name);
        }
        logger.notice("System dependencies installed");
        return { exitCode: 0, completed };
    }
}
