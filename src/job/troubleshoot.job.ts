import type { OpsConfig } from "../common/config";
import { troubleshootingCommands } from "../provision/provision.plan";
import { describeCommand } from "../shared/service-provider/command.service.provider";
import type { CommandRunner } from "../shared/type/command.type";

export type TroubleshootSection = {
    title: string;
    command: string;
    exitCode: number | null;
    output: string;
};

/** Collects the diagnostics operators look at when the site is down. Never stops early. */
export class TroubleshootJob {
    constructor(
        private readonly config: OpsConfig,
        private readonly commands: CommandRunner
    ) {}

    async run(): Promise<TroubleshootSection[]> {
        const sections: TroubleshootSection[] = [];
        for (const { title, spec } of troubleshootingCommands(this.config)) {
            const result = await this.commands.run(spec);
            sections.push({
                title,
                command: describeCommand(spec),
                exitCode: result.exitCode,
                output: (result.stdout + result.stderr).trimEnd()
            });
        }
        return sections;
    }
}

export function formatSections(sections: TroubleshootSection[]): string {
    return sections
        .map(
            (s) =>
                `== ${s.title} ==\n$ ${s.command}\n${s.output || `(no output, exit ${s.exitCode ?? "signal"})`}`
        )
        .join("\n\n");
}
