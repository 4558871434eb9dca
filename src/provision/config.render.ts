import { readFileSync } from "fs";
import Handlebars from "handlebars";
import { join } from "path";
import type { OpsConfig } from "../common/config";

export const CONFIG_KINDS = ["gunicorn", "systemd", "nginx", "env", "crontab"] as const;

export type ConfigKind = (typeof CONFIG_KINDS)[number];

const TEMPLATE_FILES: Record<ConfigKind, string> = {
    gunicorn: "gunicorn.conf.py.hbs",
    systemd: "systemd.service.hbs",
    nginx: "nginx.conf.hbs",
    env: "env.hbs",
    crontab: "crontab.hbs"
};

export function isConfigKind(value: string): value is ConfigKind {
    return CONFIG_KINDS.some((kind) => kind === value);
}

export function envFilePath(config: OpsConfig): string {
    return join(config.appDir, ".env");
}

/** Where each rendered file is installed on the host. */
export function configTarget(kind: ConfigKind, config: OpsConfig): string {
    switch (kind) {
        case "gunicorn":
            return join(config.appDir, "gunicorn_config.py");
        case "systemd":
            return `/etc/systemd/system/${config.serviceName}.service`;
        case "nginx":
            return `/etc/nginx/sites-available/${config.serviceName}`;
        case "env":
            return envFilePath(config);
        case "crontab":
            return "/etc/cron.d/prodtrack-ops";
    }
}

/** Double-quoted value for a systemd EnvironmentFile line. */
export function envQuote(value: string): string {
    const escaped = value
        .replace(/[\r\n]+/g, " ")
        .replace(/\\/g, "\\\\")
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

/**
 * Renders the host configuration files (gunicorn, systemd, Nginx, env,
 * cron) from the Handlebars templates in resources/templates.
 */
export class ConfigRenderer {
    private readonly hbs = Handlebars.create();
    private readonly compiled = new Map<ConfigKind, Handlebars.TemplateDelegate>();

    constructor(
        private readonly templatesDir: string,
        private readonly config: OpsConfig
    ) {
        this.hbs.registerHelper("envquote", (value: unknown) =>
            envQuote(String(value ?? ""))
        );
    }

    private template(kind: ConfigKind): Handlebars.TemplateDelegate {
        let template = this.compiled.get(kind);
        if (!template) {
            const source = readFileSync(join(this.templatesDir, TEMPLATE_FILES[kind]), "utf8");
            template = this.hbs.compile(source, { noEscape: true, strict: true });
            this.compiled.set(kind, template);
        }
        return template;
    }

    render(kind: ConfigKind): string {
        return this.template(kind)({
            ...this.config,
            envFile: envFilePath(this.config)
        });
    }
}
