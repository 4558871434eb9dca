import { join } from "path";
import type { OpsConfig } from "../common/config";
import { manage } from "../job/deploy.job";
import type { CommandSpec } from "../shared/type/command.type";
import { type ConfigKind, configTarget, envFilePath } from "./config.render";
import type { PackageLists } from "./packages";

/** Provisioning states of a VPS, in the order the runbook reaches them. */
export const PROVISION_STATES = [
    "unprovisioned",
    "os-packages-installed",
    "runtime-installed",
    "application-cloned",
    "environment-configured",
    "database-migrated",
    "process-supervised",
    "reverse-proxy-configured",
    "tls-issued",
    "maintenance-scheduled",
    "hardened"
] as const;

export type ProvisionState = (typeof PROVISION_STATES)[number];

export type ProvisionAction =
    | { kind: "command"; description: string; spec: CommandSpec }
    | { kind: "file"; description: string; config: ConfigKind; path: string; mode: number };

export type ProvisionTransition = {
    from: ProvisionState;
    to: ProvisionState;
    description: string;
    actions: ProvisionAction[];
};

export function isProvisionState(value: string): value is ProvisionState {
    return PROVISION_STATES.some((state) => state === value);
}

export function stateIndex(state: ProvisionState): number {
    return PROVISION_STATES.indexOf(state);
}

function run(description: string, command: string, ...args: string[]): ProvisionAction {
    return { kind: "command", description, spec: { command, args } };
}

function file(description: string, config: ConfigKind, path: string, mode = 0o644): ProvisionAction {
    return { kind: "file", description, config, path, mode };
}

/**
 * Runs a command as the deploy user. Environment values are kept off the
 * command line: the runner sets them on sudo, which passes the named
 * variables through.
 */
export function asUser(user: string, spec: CommandSpec): CommandSpec {
    const names = Object.keys(spec.env ?? {});
    return {
        command: "sudo",
        args: [
            "-u",
            user,
            "-H",
            ...(names.length ? [`--preserve-env=${names.join(",")}`] : []),
            spec.command,
            ...spec.args
        ],
        cwd: spec.cwd,
        env: spec.env
    };
}

function apt(description: string, packages: string[]): ProvisionAction {
    return run(description, "env", "DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", ...packages);
}

/**
 * The runbook as transitions between consecutive states. Provisioning runs
 * as root; application steps switch to the deploy user.
 */
export function provisionPlan(config: OpsConfig, packages: PackageLists): ProvisionTransition[] {
    const { appDir, deployUser, serviceName, domain } = config;
    const asDeploy = (description: string, spec: CommandSpec): ProvisionAction => ({
        kind: "command",
        description,
        spec: asUser(deployUser, spec)
    });
    const python = join(appDir, "venv", "bin", "python");

    const actions: Record<Exclude<ProvisionState, "unprovisioned">, [string, ProvisionAction[]]> = {
        "os-packages-installed": [
            "Install OS packages",
            [
                run("Refresh package index", "apt-get", "update"),
                run("Upgrade installed packages", "env", "DEBIAN_FRONTEND=noninteractive", "apt-get", "upgrade", "-y"),
                apt("Install system packages", packages.system)
            ]
        ],
        "runtime-installed": [
            "Install Python/Node runtime and PDF toolchain",
            [
                apt("Install language runtimes", packages.runtime),
                apt("Install headless browser dependencies", packages.pdf.browser),
                apt("Install fonts", packages.pdf.fonts),
                apt("Install PDF engine dependencies", packages.pdf.engine),
                run("Create deploy user if missing", "bash", "-c", `id -u ${deployUser} >/dev/null 2>&1 || adduser --disabled-password --gecos "" ${deployUser}`)
            ]
        ],
        "application-cloned": [
            "Clone the application and create its virtualenv",
            [
                asDeploy("Clone repository", {
                    command: "bash",
                    args: ["-c", `test -d ${appDir}/.git || git clone --branch ${config.deployBranch} ${config.repoUrl} ${appDir}`]
                }),
                asDeploy("Create virtualenv", { command: "python3", args: ["-m", "venv", join(appDir, "venv")], cwd: appDir }),
                asDeploy("Install Python requirements", {
                    command: join(appDir, "venv", "bin", "pip"),
                    args: ["install", "-r", "requirements.txt"],
                    cwd: appDir
                }),
                asDeploy("Install PDF browser", { command: python, args: ["-m", "playwright", "install", "chromium"], cwd: appDir })
            ]
        ],
        "environment-configured": [
            "Write the application environment file",
            [
                file("Environment file", "env", envFilePath(config), 0o600),
                run("Hand the environment file to the deploy user", "chown", `${deployUser}:${deployUser}`, envFilePath(config))
            ]
        ],
        "database-migrated": [
            "Migrate the database and build assets",
            [
                asDeploy("Apply migrations", manage(appDir, config.django, "migrate", "--noinput")),
                asDeploy("Install Tailwind dependencies", manage(appDir, config.django, "tailwind", "install")),
                asDeploy("Build CSS", manage(appDir, config.django, "tailwind", "build")),
                asDeploy("Collect static files", manage(appDir, config.django, "collectstatic", "--noinput")),
                asDeploy("Enable WAL journal mode", { command: "sqlite3", args: [config.databasePath, "PRAGMA journal_mode=WAL;"], cwd: appDir })
            ]
        ],
        "process-supervised": [
            "Run gunicorn under systemd",
            [
                file("gunicorn configuration", "gunicorn", configTarget("gunicorn", config)),
                file("systemd unit", "systemd", configTarget("systemd", config)),
                run("Reload systemd", "systemctl", "daemon-reload"),
                run("Enable and start the service", "systemctl", "enable", "--now", serviceName)
            ]
        ],
        "reverse-proxy-configured": [
            "Put Nginx in front of gunicorn",
            [
                file("Nginx site", "nginx", configTarget("nginx", config)),
                run("Enable the site", "ln", "-sf", configTarget("nginx", config), `/etc/nginx/sites-enabled/${serviceName}`),
                run("Disable the default site", "rm", "-f", "/etc/nginx/sites-enabled/default"),
                run("Test Nginx configuration", "nginx", "-t"),
                run("Reload Nginx", "systemctl", "reload", "nginx")
            ]
        ],
        "tls-issued": [
            "Obtain TLS certificates",
            [
                run(
                    "Request certificates from Let's Encrypt",
                    "certbot", "--nginx", "--non-interactive", "--agree-tos", "--redirect",
                    "-m", config.certbotEmail, "-d", domain, "-d", `www.${domain}`
                ),
                run("Check automatic renewal", "certbot", "renew", "--dry-run")
            ]
        ],
        "maintenance-scheduled": [
            "Schedule backups and health checks",
            [
                run("Create backup and log directories", "install", "-d", "-o", deployUser, "-g", deployUser, config.backupDir, config.logDir),
                run("Allow the deploy user to restart the service", "bash", "-c",
                    `echo "${deployUser} ALL=(root) NOPASSWD: /usr/bin/systemctl restart ${serviceName}" > /etc/sudoers.d/${serviceName} && chmod 440 /etc/sudoers.d/${serviceName}`),
                file("Cron schedule", "crontab", configTarget("crontab", config))
            ]
        ],
        hardened: [
            "Harden the host",
            [
                run("Allow SSH", "ufw", "allow", "OpenSSH"),
                run("Allow HTTP and HTTPS", "ufw", "allow", "Nginx Full"),
                run("Enable the firewall", "ufw", "--force", "enable"),
                run("Enable fail2ban", "systemctl", "enable", "--now", "fail2ban"),
                run("Restrict the database file", "chmod", "640", config.databasePath),
                run("Restrict the environment file", "chmod", "600", envFilePath(config))
            ]
        ]
    };

    return PROVISION_STATES.slice(1).map((to, i) => {
        if (to === "unprovisioned") throw new Error("unprovisioned has no inbound transition");
        const [description, steps] = actions[to];
        return { from: PROVISION_STATES[i], to, description, actions: steps };
    });
}

/** Commands the runbook lists for diagnosing a half-provisioned host. */
export function troubleshootingCommands(config: OpsConfig): Array<{ title: string; spec: CommandSpec }> {
    const port = config.gunicornBind.split(":").pop() ?? "8000";
    const shell = (command: string): CommandSpec => ({ command: "bash", args: ["-c", command] });
    return [
        { title: "gunicorn processes", spec: shell("ps aux | grep [g]unicorn") },
        { title: `listeners on port ${port}`, spec: shell(`ss -tlnp | grep :${port}`) },
        { title: "Nginx configuration test", spec: shell("sudo nginx -t 2>&1") },
        { title: `${config.serviceName} journal`, spec: shell(`sudo journalctl -u ${config.serviceName} -n 50 --no-pager`) },
        { title: "Nginx error log", spec: shell("sudo tail -n 50 /var/log/nginx/error.log") },
        { title: "gunicorn error log", spec: shell(`tail -n 50 ${join(config.appDir, "gunicorn_error.log")}`) }
    ];
}

