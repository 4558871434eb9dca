/**
 * Error hierarchy for the maintenance jobs. `stage` names the step that
 * failed so the maintenance log and alerts can say where a run stopped.
 */
export class OpsError extends Error {
    constructor(
        message: string,
        readonly stage: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigError extends OpsError {
    constructor(readonly variable: string, message: string) {
        super(`${variable}: ${message}`, "config");
    }
}

export class CommandError extends OpsError {
    /** Last stderr line, or the exit code when the command printed nothing. */
    readonly detail: string;

    constructor(
        readonly command: string,
        readonly exitCode: number | null,
        readonly stderr: string,
        stage = "command"
    ) {
        const lastLine = stderr.trim().split("\n").pop() ?? "";
        super(
            `"${command}" exited with ${exitCode ?? "signal"}${lastLine ? `: ${lastLine}` : ""}`,
            stage
        );
        this.detail = lastLine || `exit code ${exitCode ?? "signal"}`;
    }
}

export class BackupError extends OpsError {}

export class ProvisionError extends OpsError {}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Rejected user input (report query parameters, CLI arguments). */
export class InvalidQueryError extends OpsError {
    constructor(message: string) {
        super(message, "query");
    }
}
