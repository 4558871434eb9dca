import { describe, expect, it } from "vitest";
import { parseCommandLine } from "./cli";
import { InvalidQueryError } from "./common/errors";

describe("parseCommandLine", () => {
    it("parses the maintenance commands", () => {
        expect(parseCommandLine(["health-check"])).toEqual({ name: "health-check" });
        expect(parseCommandLine(["backup"])).toEqual({ name: "backup" });
        expect(parseCommandLine(["deploy"])).toEqual({ name: "deploy" });
    });

    it("provisions to the hardened state by default", () => {
        expect(parseCommandLine(["provision"])).toEqual({ name: "provision", target: "hardened", dryRun: false });
    });

    it("takes a target state and a dry run flag", () => {
        expect(parseCommandLine(["provision", "--target", "tls-issued", "--dry-run"])).toEqual({
            name: "provision",
            target: "tls-issued",
            dryRun: true
        });
    });

    it("rejects an unknown target state", () => {
        expect(() => parseCommandLine(["provision", "--target", "done"])).toThrow(InvalidQueryError);
    });

    it("needs a known kind for render-config", () => {
        expect(parseCommandLine(["render-config", "nginx"])).toEqual({ name: "render-config", kind: "nginx" });
        expect(() => parseCommandLine(["render-config"])).toThrow(
            "render-config needs one of gunicorn, systemd, nginx, env, crontab"
        );
    });

    it("shows help without a command", () => {
        expect(parseCommandLine([])).toEqual({ name: "help" });
        expect(parseCommandLine(["--help"])).toEqual({ name: "help" });
    });

    it("rejects unknown commands and options", () => {
        expect(() => parseCommandLine(["restore"])).toThrow('unknown command "restore"');
        expect(() => parseCommandLine(["backup", "--force"])).toThrow();
        expect(() => parseCommandLine(["backup", "now"])).toThrow("backup takes no arguments");
    });
});
