import { describe, expect, it } from "vitest";
import type { PackageLists } from "../provision/packages";
import type { CommandResult, CommandRunner, CommandSpec } from "../shared/type/command.type";
import { pdfFollowUp, pdfSetupSteps, SetupPdfJob } from "./setup-pdf.job";

const packages: PackageLists = {
    system: ["git"],
    runtime: ["python3"],
    pdf: {
        browser: ["libnss3", "libgbm1"],
        fonts: ["fonts-liberation"],
        engine: ["libpango-1.0-0"]
    }
};

class ExitCodes implements CommandRunner {
    readonly specs: CommandSpec[] = [];
    constructor(private readonly codes: Array<number | null>) {}
    async run(spec: CommandSpec): Promise<CommandResult> {
        const n = this.specs.length;
        const exitCode = n < this.codes.length ? this.codes[n] : 0;
        this.specs.push(spec);
        return { exitCode, stdout: "", stderr: "" };
    }
}

describe("pdfSetupSteps", () => {
    it("updates the index, then installs the three package groups non-interactively", () => {
        expect(pdfSetupSteps(packages).map((s) => s.spec)).toEqual([
            { command: "sudo", args: ["apt-get", "update"] },
            { command: "sudo", args: ["DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", "libnss3", "libgbm1"] },
            { command: "sudo", args: ["DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", "fonts-liberation"] },
            { command: "sudo", args: ["DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", "libpango-1.0-0"] }
        ]);
    });
});

describe("SetupPdfJob", () => {
    it("exits 0 once every group is installed", async () => {
        const commands = new ExitCodes([]);
        const report = await new SetupPdfJob(packages, commands).run();
        expect(report.exitCode).toBe(0);
        expect(report.completed).toHaveLength(4);
        expect(commands.specs).toHaveLength(4);
    });

    it("stops at the first failure with that command's exit code", async () => {
        const commands = new ExitCodes([0, 100]);
        const report = await new SetupPdfJob(packages, commands).run();
        expect(report).toEqual({
            exitCode: 100,
            completed: ["Updating package index"],
            failed: "Installing headless browser dependencies"
        });
        expect(commands.specs).toHaveLength(2);
    });

    it("maps a signal to exit code 1", async () => {
        const report = await new SetupPdfJob(packages, new ExitCodes([null])).run();
        expect(report.exitCode).toBe(1);
    });
});

describe("pdfFollowUp", () => {
    it("ends with a service restart", () => {
        expect(pdfFollowUp("/srv/tracker", "production_tracker")).toEqual([
            "cd /srv/tracker",
            "source venv/bin/activate",
            "pip install -r requirements.txt",
            "python -m playwright install chromium",
            "sudo systemctl restart production_tracker"
        ]);
    });
});
