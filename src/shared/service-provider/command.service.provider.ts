/**
 * Child process execution for the maintenance and provisioning jobs
 * @license MIT
 */
import { spawn } from "child_process";
import { Logger } from "../../common/logger";
import { CommandError } from "../../common/errors";
import type {
    CommandResult,
    CommandRunner,
    CommandSpec
} from "../type/command.type";

const logger = new Logger("CommandServiceProvider");

export function describeCommand(spec: CommandSpec): string {
    return [spec.command, ...spec.args]
        .map((part) => (/[\s"'$|&;<>]/.test(part) ? JSON.stringify(part) : part))
        .join(" ");
}

/**
 * Runs a command and throws CommandError unless it exits with 0.
 * The error carries the stage so callers can report where they stopped.
 */
export async function runChecked(
    runner: CommandRunner,
    spec: CommandSpec,
    stage = "command"
): Promise<CommandResult> {
    const result = await runner.run(spec);
    if (result.exitCode !== 0) {
        throw new CommandError(
            describeCommand(spec),
            result.exitCode,
            result.stderr,
            stage
        );
    }
    return result;
}

export class CommandServiceProvider implements CommandRunner {
    run(spec: CommandSpec): Promise<CommandResult> {
        const line = describeCommand(spec);
        logger.info(`$ ${line}${spec.cwd ? ` (in ${spec.cwd})` : ""}`);

        return new Promise((resolve) => {
            let stdout = "";
            let stderr = "";
            const child = spawn(spec.command, spec.args, {
                cwd: spec.cwd,
                env: { ...process.env, ...spec.env },
                stdio: ["ignore", "pipe", "pipe"]
            });

            child.stdout.on("data", (chunk: Buffer) => {
                stdout += chunk.toString();
            });
            child.stderr.on("data", (chunk: Buffer) => {
                stderr += chunk.toString();
            });

            // spawn failures (missing binary, bad cwd) surface as "command not found"
            child.on("error", (err) => {
                logger.error(`Cannot start ${spec.command}: ${err.message}`);
                resolve({ exitCode: 127, stdout, stderr: stderr + err.message });
            });

            child.on("close", (code) => {
                if (code !== 0) {
                    logger.debug(`${line} exited with ${code ?? "signal"}`);
                }
                resolve({ exitCode: code, stdout, stderr });
            });
        });
    }
}
