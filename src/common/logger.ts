import pino from "pino";

declare module "fastify" {
    interface FastifyBaseLogger {
        notice: pino.LogFn;
    }
}

/**
 * Context-bound pino logger shared by the CLI jobs and the console server.
 * Output goes to stderr so commands that print rendered files on stdout
 * (render-config) can be piped straight into place.
 */
export class Logger {
    static readonly config = {
        customLevels: { notice: 35 },
        base: { context: "Ops" },
        level: process.env.LOG_LEVEL || "notice",
        transport: {
            target: "pino-pretty",
            options: {
                customLevels: "trace:10,debug:20,info:30,notice:35,warn:40,error:50,fatal:60",
                colorize: [undefined, "local", "docker"].includes(
                    process.env.APP_ENV
                ), // colorize only in local
                destination: 2,
                singleLine: true,
                levelFirst: false,
                translateTime: "yyyy-mm-dd'T'HH:MM:ss.l'Z'",
                messageFormat: "[{context}] {msg}",
                ignore: "pid,hostname,context,req,res,responseTime,reqId",
                errorLikeObjectKeys: ["err", "error"]
            }
        }
    };

    private static readonly root: pino.Logger<"notice"> = pino(Logger.config);

    /** Drains the transport; call before process.exit or lines are lost. */
    static flush(): Promise<void> {
        return new Promise((resolve) => Logger.root.flush(() => resolve()));
    }

    readonly notice: pino.LogFn;
    readonly error: pino.LogFn;
    readonly warn: pino.LogFn;
    readonly info: pino.LogFn;
    readonly debug: pino.LogFn;
    readonly fatal: pino.LogFn;

    constructor(context: string) {
        const child = Logger.root.child({ context });
        this.notice = child.notice.bind(child);
        this.error  = child.error.bind(child);
        this.warn   = child.warn.bind(child);
        this.info   = child.info.bind(child);
        this.debug  = child.debug.bind(child);
        this.fatal  = child.fatal.bind(child);
    }
}
