import { readFileSync } from "fs";
import { join } from "path";
import { ConfigError } from "../common/errors";

export type PackageLists = {
    system: string[];
    runtime: string[];
    pdf: {
        browser: string[];
        fonts: string[];
        engine: string[];
    };
};

function list(value: unknown, key: string): string[] {
    if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
        throw new ConfigError("packages.json", `"${key}" must be a list of package names`);
    }
    // apt accepts duplicates, the log reads better without them
    return [...new Set<string>(value)];
}

function section(value: unknown, key: string): Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        throw new ConfigError("packages.json", `"${key}" must be an object`);
    }
    return Object.fromEntries(Object.entries(value));
}

export function parsePackageLists(raw: unknown): PackageLists {
    const root = section(raw, "root");
    const pdf = section(root.pdf, "pdf");
    return {
        system: list(root.system, "system"),
        runtime: list(root.runtime, "runtime"),
        pdf: {
            browser: list(pdf.browser, "pdf.browser"),
            fonts: list(pdf.fonts, "pdf.fonts"),
            engine: list(pdf.engine, "pdf.engine")
        }
    };
}

export function loadPackageLists(resourcesDir: string): PackageLists {
    const file = join(resourcesDir, "provision", "packages.json");
    return parsePackageLists(JSON.parse(readFileSync(file, "utf8")));
}
