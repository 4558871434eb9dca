import { readFileSync } from "fs";
import { join } from "path";
import { ConfigError } from "./errors";

function readVersion(): string {
    try {
        const pkg: { version?: unknown } = JSON.parse(
            readFileSync(join(__dirname, "..", "..", "package.json"), "utf8")
        );
        return typeof pkg.version === "string" ? pkg.version : "dev";
    } catch {
        return "dev";
    }
}

export const APP_VERSION = readVersion();

/** Variables the Django application reads; exported to manage.py and written to its env file. */
export type DjangoEnvironment = {
    DJANGO_SETTINGS_MODULE: string;
    DJANGO_SECRET_KEY: string;
    ADMIN_URL: string;
    RESEND_API_KEY: string;
    DEFAULT_FROM_EMAIL: string;
};

export type OpsConfig = {
    appDir: string;
    deployUser: string;
    gunicornBind: string;
    gunicornWorkers: number;
    certbotEmail: string;
    cliCommand: string;
    serviceName: string;
    domain: string;
    repoUrl: string;
    deployBranch: string;
    databasePath: string;
    backupDir: string;
    backupRetentionDays: number;
    logDir: string;
    healthUrl: string;
    healthTimeoutMs: number;
    diskPath: string;
    diskThreshold: number;
    deploySettleMs: number;
    stateFile: string;
    alertTo: string[];
    consolePort: number;
    resourcesDir: string;
    django: DjangoEnvironment;
};

function text(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
    const value = env[name];
    return value && value.trim() ? value.trim() : fallback;
}

function integer(
    env: NodeJS.ProcessEnv,
    name: string,
    fallback: number,
    min: number,
    max: number
): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ConfigError(
            name,
            `expected an integer between ${min} and ${max}, got "${raw}"`
        );
    }
    return value;
}

function url(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
    const value = text(env, name, fallback);
    try {
        new URL(value);
    } catch {
        throw new ConfigError(name, `not a valid URL: "${value}"`);
    }
    return value;
}

/**
 * Reads the tooling configuration from the environment. Paths default to the
 * single-VPS layout: the app under /home/deploy, backups and cron logs next
 * to it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OpsConfig {
    const appDir = text(env, "OPS_APP_DIR", "/home/deploy/production_tracker");
    const defaultFrom = text(env, "DEFAULT_FROM_EMAIL", "noreply@example.com");

    return {
        appDir,
        deployUser: text(env, "OPS_DEPLOY_USER", "deploy"),
        gunicornBind: text(env, "OPS_GUNICORN_BIND", "127.0.0.1:8000"),
        gunicornWorkers: integer(env, "OPS_GUNICORN_WORKERS", 2, 1, 64),
        certbotEmail: text(env, "OPS_CERTBOT_EMAIL", defaultFrom),
        cliCommand: text(env, "OPS_CLI_COMMAND", "prodtrack-ops"),
        serviceName: text(env, "OPS_SERVICE_NAME", "production_tracker"),
        domain: text(env, "OPS_DOMAIN", "example.com"),
        repoUrl: text(env, "OPS_REPO_URL", ""),
        deployBranch: text(env, "OPS_DEPLOY_BRANCH", "main"),
        databasePath: text(env, "OPS_DB_PATH", join(appDir, "db.sqlite3")),
        backupDir: text(env, "OPS_BACKUP_DIR", "/home/deploy/backups"),
        backupRetentionDays: integer(env, "OPS_BACKUP_RETENTION_DAYS", 30, 1, 3650),
        logDir: text(env, "OPS_LOG_DIR", "/home/deploy/logs"),
        healthUrl: url(env, "OPS_HEALTH_URL", "http://127.0.0.1:8000/"),
        healthTimeoutMs: integer(env, "OPS_HEALTH_TIMEOUT_MS", 10_000, 100, 300_000),
        diskPath: text(env, "OPS_DISK_PATH", "/"),
        diskThreshold: integer(env, "OPS_DISK_THRESHOLD", 80, 1, 99),
        deploySettleMs: integer(env, "OPS_DEPLOY_SETTLE_MS", 5_000, 0, 120_000),
        stateFile: text(env, "OPS_STATE_FILE", "/var/lib/prodtrack-ops/provision.json"),
        alertTo: text(env, "OPS_ALERT_TO", "")
            .split(",")
            .map((a) => a.trim())
            .filter(Boolean),
        consolePort: integer(env, "PORT", 3000, 1, 65_535),
        resourcesDir: text(env, "OPS_RESOURCES_DIR", join(__dirname, "..", "..", "resources")),
        django: {
            DJANGO_SETTINGS_MODULE: text(env, "DJANGO_SETTINGS_MODULE", "core.settings_prod"),
            DJANGO_SECRET_KEY: text(env, "DJANGO_SECRET_KEY", ""),
            ADMIN_URL: text(env, "ADMIN_URL", "admin/"),
            RESEND_API_KEY: text(env, "RESEND_API_KEY", ""),
            DEFAULT_FROM_EMAIL: defaultFrom
        }
    };
}
