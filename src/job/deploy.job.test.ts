import { describe, expect, it } from "vitest";
import type { DjangoEnvironment } from "../common/config";
import type { HttpProbe, ProbeResult } from "../shared/service-provider/http-probe.service.provider";
import type { CommandResult, CommandRunner, CommandSpec } from "../shared/type/command.type";
import { DeployJob, type DeploySettings, deploySteps, manage } from "./deploy.job";

const django: DjangoEnvironment = {
    DJANGO_SETTINGS_MODULE: "core.settings_prod",
    DJANGO_SECRET_KEY: "test-secret",
    ADMIN_URL: "admin/",
    RESEND_API_KEY: "",
    DEFAULT_FROM_EMAIL: "noreply@example.com"
};

const settings: DeploySettings = {
    appDir: "/srv/tracker",
    branch: "main",
    serviceName: "production_tracker",
    healthUrl: "http://127.0.0.1:8000/",
    settleMs: 5_000,
    django
};

/** Succeeds for every command except the one whose arguments include `failOn`. */
class ScriptedRunner implements CommandRunner {
    readonly specs: CommandSpec[] = [];
    constructor(private readonly failOn?: string, private readonly stderr = "") {}
    async run(spec: CommandSpec): Promise<CommandResult> {
        this.specs.push(spec);
        const failed = this.failOn !== undefined && spec.args.includes(this.failOn);
        return { exitCode: failed ? 1 : 0, stdout: "", stderr: failed ? this.stderr : "" };
    }
}

class FakeProbe implements HttpProbe {
    calls = 0;
    constructor(private readonly status: number | null) {}
    async get(_url: string): Promise<ProbeResult> {
        this.calls++;
        return { status: this.status, durationMs: 1 };
    }
}

describe("deploySteps", () => {
    it("runs the runbook steps in order", () => {
        expect(deploySteps(settings).map((s) => s.name)).toEqual([
            "pull",
            "install",
            "migrate",
            "build-css",
            "collectstatic",
            "restart"
        ]);
    });

    it("runs management commands through the virtualenv with the Django variables set", () => {
        expect(manage("/srv/tracker", django, "migrate", "--noinput")).toEqual({
            command: "/srv/tracker/venv/bin/python",
            args: ["manage.py", "migrate", "--noinput"],
            cwd: "/srv/tracker",
            env: {
                DJANGO_SETTINGS_MODULE: "core.settings_prod",
                DJANGO_SECRET_KEY: "test-secret",
                ADMIN_URL: "admin/",
                DEFAULT_FROM_EMAIL: "noreply@example.com"
            }
        });
    });
});

describe("DeployJob", () => {
    it("waits for the restart to settle and reports the health status", async () => {
        const waits: number[] = [];
        const commands = new ScriptedRunner();
        const report = await new DeployJob(settings, {
            commands,
            probe: new FakeProbe(200),
            wait: async (ms) => {
                waits.push(ms);
            }
        }).run();

        expect(report).toEqual({
            ok: true,
            status: "200",
            steps: ["pull", "install", "migrate", "build-css", "collectstatic", "restart"]
        });
        expect(waits).toEqual([5_000]);
        expect(commands.specs[0]).toEqual({ command: "git", args: ["pull", "origin", "main"], cwd: "/srv/tracker" });
    });

    it("stops at the first failing step", async () => {
        const commands = new ScriptedRunner("migrate", "django.db.utils.OperationalError: database is locked\n");
        const probe = new FakeProbe(200);
        const report = await new DeployJob(settings, { commands, probe, wait: async () => undefined }).run();

        expect(report).toEqual({
            ok: false,
            failedStep: "migrate",
            message: "Deployment stopped at migrate: django.db.utils.OperationalError: database is locked",
            steps: ["pull", "install"]
        });
        expect(commands.specs).toHaveLength(3);
        expect(probe.calls).toBe(0);
    });

    it("fails when the application does not answer 200 afterwards", async () => {
        const report = await new DeployJob(settings, {
            commands: new ScriptedRunner(),
            probe: new FakeProbe(502),
            wait: async () => undefined
        }).run();

        expect(report.ok).toBe(false);
        if (report.ok) return;
        expect(report.failedStep).toBe("health-check");
        expect(report.message).toBe("Deployment failed health check");
    });
});
