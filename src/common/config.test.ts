import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
    it("falls back to the single VPS layout", () => {
        const config = loadConfig({});
        expect(config.appDir).toBe("/home/deploy/production_tracker");
        expect(config.databasePath).toBe("/home/deploy/production_tracker/db.sqlite3");
        expect(config.serviceName).toBe("production_tracker");
        expect(config.healthUrl).toBe("http://127.0.0.1:8000/");
        expect(config.healthTimeoutMs).toBe(10_000);
        expect(config.diskThreshold).toBe(80);
        expect(config.backupRetentionDays).toBe(30);
        expect(config.deploySettleMs).toBe(5_000);
        expect(config.alertTo).toEqual([]);
        expect(config.consolePort).toBe(3000);
        expect(config.django.DJANGO_SETTINGS_MODULE).toBe("core.settings_prod");
    });

    it("derives the database path from the app directory", () => {
        const config = loadConfig({ OPS_APP_DIR: "/srv/tracker" });
        expect(config.databasePath).toBe("/srv/tracker/db.sqlite3");
    });

    it("splits and trims the alert recipients", () => {
        const config = loadConfig({ OPS_ALERT_TO: " ops@example.com, ,oncall@example.com " });
        expect(config.alertTo).toEqual(["ops@example.com", "oncall@example.com"]);
    });

    it("uses DEFAULT_FROM_EMAIL for certbot when no e-mail is given", () => {
        const config = loadConfig({ DEFAULT_FROM_EMAIL: "tracker@example.com" });
        expect(config.certbotEmail).toBe("tracker@example.com");
        expect(config.django.DEFAULT_FROM_EMAIL).toBe("tracker@example.com");
    });

    it("rejects an out of range threshold", () => {
        expect(() => loadConfig({ OPS_DISK_THRESHOLD: "100" })).toThrow(ConfigError);
        expect(() => loadConfig({ OPS_DISK_THRESHOLD: "80.5" })).toThrow(
            'OPS_DISK_THRESHOLD: expected an integer between 1 and 99, got "80.5"'
        );
    });

    it("rejects a health URL that does not parse", () => {
        expect(() => loadConfig({ OPS_HEALTH_URL: "not a url" })).toThrow(
            'OPS_HEALTH_URL: not a valid URL: "not a url"'
        );
    });
});
