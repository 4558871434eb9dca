export type CommandSpec = {
    command: string;
    args: string[];
    cwd?: string;
    /** Merged over the current process environment. */
    env?: Record<string, string>;
};

export type CommandResult = {
    /** null when the process was killed by a signal. */
    exitCode: number | null;
    stdout: string;
    stderr: string;
};

export interface CommandRunner {
    run(spec: CommandSpec): Promise<CommandResult>;
}
