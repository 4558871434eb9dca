import type { FastifyInstance } from "fastify";
import { Logger } from "./logger";

const logger = new Logger("Shutdown");

let instance: FastifyInstance | null = null;
const closers: Array<{ name: string; close: () => void | Promise<void> }> = [];

export function setFastifyInstance(fastify: FastifyInstance): void {
    instance = fastify;
}

/** Registers a resource (database handle, client) to release on exit. */
export function onShutdown(
    name: string,
    close: () => void | Promise<void>
): void {
    closers.push({ name, close });
}

export async function shutdown(code: number): Promise<never> {
    logger.debug("Shutting down...");
    if (instance) {
        await instance
            .close()
            .catch((err) => logger.error({ err }, "Error closing Fastify"));
    }
    for (const { name, close } of closers.splice(0)) {
        try {
            await close();
        } catch (err) {
            logger.error({ err }, `Error closing ${name}`);
        }
    }
    await Logger.flush();
    process.exit(code);
}
