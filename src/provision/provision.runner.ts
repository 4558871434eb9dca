/**
 * Drives a host through the provisioning states, one transition at a time,
 * recording progress so a re-run resumes where the last one stopped
 * @license MIT
 */
import { chmod, mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { errorMessage, ProvisionError } from "../common/errors";
import { Logger } from "../common/logger";
import { type Clock, systemClock } from "../common/maintenance-log";
import { describeCommand, runChecked } from "../shared/service-provider/command.service.provider";
import type { CommandRunner } from "../shared/type/command.type";
import type { ConfigKind } from "./config.render";
import {
    isProvisionState,
    type ProvisionAction,
    type ProvisionState,
    type ProvisionTransition,
    stateIndex
} from "./provision.plan";

const logger = new Logger("ProvisionRunner");

export type ProvisionHistoryEntry = {
    from: ProvisionState;
    to: ProvisionState;
    at: string;
};

export type ProvisionStateFile = {
    state: ProvisionState;
    updatedAt: string;
    history: ProvisionHistoryEntry[];
};

export interface ProvisionStore {
    load(): Promise<ProvisionStateFile>;
    save(state: ProvisionStateFile): Promise<void>;
}

export interface FileWriter {
    write(path: string, content: string, mode: number): Promise<void>;
}

export interface ConfigSource {
    render(kind: ConfigKind): string;
}

export type ProvisionDeps = {
    commands: CommandRunner;
    store: ProvisionStore;
    files: FileWriter;
    configs: ConfigSource;
    clock?: Clock;
};

export type ProvisionReport = {
    from: ProvisionState;
    reached: ProvisionState;
    target: ProvisionState;
    dryRun: boolean;
    /** "<from> -> <to>: <action>" for every action run, or that would run */
    actions: string[];
    failed?: { transition: string; action: string; error: string };
};

function isHistoryEntry(value: unknown): value is ProvisionHistoryEntry {
    if (typeof value !== "object" || value === null) return false;
    return (
        "from" in value &&
        typeof value.from === "string" &&
        isProvisionState(value.from) &&
        "to" in value &&
        typeof value.to === "string" &&
        isProvisionState(value.to) &&
        "at" in value &&
        typeof value.at === "string"
    );
}

export function parseStateFile(raw: unknown): ProvisionStateFile {
    if (typeof raw !== "object" || raw === null) {
        throw new ProvisionError("state file is not a JSON object", "state");
    }
    if (!("state" in raw) || typeof raw.state !== "string" || !isProvisionState(raw.state)) {
        throw new ProvisionError("state file has no valid \"state\"", "state");
    }
    const history =
        "history" in raw && Array.isArray(raw.history)
            ? raw.history.filter(isHistoryEntry)
            : [];
    const updatedAt =
        "updatedAt" in raw && typeof raw.updatedAt === "string" ? raw.updatedAt : "";
    return { state: raw.state, updatedAt, history };
}

/** JSON state file; a missing file means the host was never provisioned. */
export class FileProvisionStore implements ProvisionStore {
    constructor(readonly path: string) {}

    async load(): Promise<ProvisionStateFile> {
        let text: string;
        try {
            text = await readFile(this.path, "utf8");
        } catch (err) {
            if (err instanceof Error && "code" in err && err.code === "ENOENT") {
                return { state: "unprovisioned", updatedAt: "", history: [] };
            }
            throw err;
        }
        try {
            return parseStateFile(JSON.parse(text));
        } catch (err) {
            throw new ProvisionError(`${this.path}: ${errorMessage(err)}`, "state", { cause: err });
        }
    }

    async save(state: ProvisionStateFile): Promise<void> {
        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(this.path, JSON.stringify(state, null, 4) + "\n", "utf8");
    }
}

export class FsFileWriter implements FileWriter {
    async write(path: string, content: string, mode: number): Promise<void> {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, content, { encoding: "utf8", mode });
        // writeFile only applies mode when it creates the file
        await chmod(path, mode);
    }
}

export class ProvisionRunner {
    private readonly clock: Clock;

    constructor(
        private readonly plan: ProvisionTransition[],
        private readonly deps: ProvisionDeps
    ) {
        this.clock = deps.clock ?? systemClock;
    }

    /** Transitions still needed to get from `from` to `target`, in order. */
    pending(from: ProvisionState, target: ProvisionState): ProvisionTransition[] {
        const start = stateIndex(from);
        const end = stateIndex(target);
        return this.plan.filter((t) => stateIndex(t.from) >= start && stateIndex(t.to) <= end);
    }

    private label(transition: ProvisionTransition, action: ProvisionAction): string {
        const what =
            action.kind === "command"
                ? describeCommand(action.spec)
                : `write ${action.path}`;
        return `${transition.from} -> ${transition.to}: ${action.description} (${what})`;
    }

    private async perform(action: ProvisionAction): Promise<void> {
        if (action.kind === "file") {
            const content = this.deps.configs.render(action.config);
            await this.deps.files.write(action.path, content, action.mode);
            return;
        }
        await runChecked(this.deps.commands, action.spec, action.description);
    }

    async run(
        target: ProvisionState = "hardened",
        dryRun = false
    ): Promise<ProvisionReport> {
        const current = await this.deps.store.load();
        const from = current.state;
        const transitions = this.pending(from, target);
        const report: ProvisionReport = { from, reached: from, target, dryRun, actions: [] };

        if (transitions.length === 0) {
            logger.notice(`Host is at ${from}, nothing to do for ${target}`);
            return report;
        }

        for (const transition of transitions) {
            logger.notice(`${transition.from} -> ${transition.to}: ${transition.description}`);

            for (const action of transition.actions) {
                const label = this.label(transition, action);
                report.actions.push(label);
                if (dryRun) continue;

                logger.info(label);
                try {
                    await this.perform(action);
                } catch (err) {
                    const error = errorMessage(err);
                    logger.error(`${action.description} failed: ${error}`);
                    report.failed = {
                        transition: `${transition.from} -> ${transition.to}`,
                        action: action.description,
                        error
                    };
                    return report;
                }
            }

            if (dryRun) continue;

            const at = this.clock().toISOString();
            current.history.push({ from: transition.from, to: transition.to, at });
            current.state = transition.to;
            current.updatedAt = at;
            await this.deps.store.save(current);
            report.reached = transition.to;
        }

        return report;
    }
}
