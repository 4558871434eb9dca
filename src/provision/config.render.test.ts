import { join } from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../common/config";
import { ConfigRenderer, configTarget, envQuote, isConfigKind } from "./config.render";

const templatesDir = join(__dirname, "..", "..", "resources", "templates");
const config = loadConfig({
    OPS_APP_DIR: "/srv/tracker",
    OPS_DOMAIN: "tracker.example.com",
    DJANGO_SECRET_KEY: "test-secret"
});

describe("envQuote", () => {
    it("escapes quotes and backslashes and folds newlines", () => {
        expect(envQuote('a "b"\\c\nd')).toBe('"a \\"b\\"\\\\c d"');
    });
});

describe("configTarget", () => {
    it("installs each file where its consumer reads it", () => {
        expect(configTarget("gunicorn", config)).toBe("/srv/tracker/gunicorn_config.py");
        expect(configTarget("systemd", config)).toBe("/etc/systemd/system/production_tracker.service");
        expect(configTarget("nginx", config)).toBe("/etc/nginx/sites-available/production_tracker");
        expect(configTarget("env", config)).toBe("/srv/tracker/.env");
        expect(configTarget("crontab", config)).toBe("/etc/cron.d/prodtrack-ops");
    });
});

describe("ConfigRenderer", () => {
    const renderer = new ConfigRenderer(templatesDir, config);

    it("proxies the site to gunicorn and keeps health checks out of the access log", () => {
        const lines = renderer.render("nginx").split("\n");
        expect(lines).toContain("    server_name tracker.example.com www.tracker.example.com;");
        expect(lines).toContain("        alias /srv/tracker/staticfiles/;");
        expect(lines).toContain("        alias /srv/tracker/media/;");
        expect(lines).toContain("        proxy_pass http://127.0.0.1:8000;");
        const health = lines.indexOf("    location /health/ {");
        expect(lines[health + 1]).toBe("        access_log off;");
    });

    it("schedules the nightly backup and the five-minute health check", () => {
        const lines = renderer.render("crontab").split("\n");
        expect(lines).toContain("0 2 * * * deploy prodtrack-ops backup >> /home/deploy/logs/cron.log 2>&1");
        expect(lines).toContain("*/5 * * * * deploy prodtrack-ops health-check >> /home/deploy/logs/cron.log 2>&1");
    });

    it("points the unit at the environment file and gunicorn config", () => {
        const lines = renderer.render("systemd").split("\n");
        expect(lines).toContain("User=deploy");
        expect(lines).toContain("EnvironmentFile=/srv/tracker/.env");
        expect(lines).toContain(
            "ExecStart=/srv/tracker/venv/bin/gunicorn --config /srv/tracker/gunicorn_config.py core.wsgi:application"
        );
    });

    it("binds gunicorn to the configured address", () => {
        const lines = renderer.render("gunicorn").split("\n");
        expect(lines).toContain('bind = "127.0.0.1:8000"');
        expect(lines).toContain('errorlog = "/srv/tracker/gunicorn_error.log"');
    });

    it("writes every Django variable quoted", () => {
        const lines = renderer.render("env").split("\n");
        expect(lines).toContain('DJANGO_SETTINGS_MODULE="core.settings_prod"');
        expect(lines).toContain('DJANGO_SECRET_KEY="test-secret"');
        expect(lines).toContain('RESEND_API_KEY=""');
    });
});

describe("isConfigKind", () => {
    it("knows the rendered kinds", () => {
        expect(isConfigKind("nginx")).toBe(true);
        expect(isConfigKind("apache")).toBe(false);
    });
});
