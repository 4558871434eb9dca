import axios, { type AxiosInstance } from "axios";
import { errorMessage } from "../../common/errors";
import { Logger } from "../../common/logger";

const logger = new Logger("HttpProbeServiceProvider");

export type ProbeResult = {
    /** null when no HTTP response arrived (refused, timeout, DNS). */
    status: number | null;
    durationMs: number;
    error?: string;
};

export interface HttpProbe {
    get(url: string): Promise<ProbeResult>;
}

/** Formats a probe status the way curl's %{http_code} does: "000" when there was no response. */
export function statusCode(result: ProbeResult): string {
    return result.status === null ? "000" : String(result.status);
}

/**
 * Single GET with no redirects and no retry. Every HTTP status resolves;
 * only transport failures end up with a null status.
 */
export class HttpProbeServiceProvider implements HttpProbe {
    constructor(
        private readonly timeoutMs: number,
        private readonly http: AxiosInstance = axios.create()
    ) {}

    async get(url: string): Promise<ProbeResult> {
        const started = Date.now();
        try {
            const res = await this.http.get(url, {
                timeout: this.timeoutMs,
                maxRedirects: 0,
                responseType: "text",
                validateStatus: () => true
            });
            const durationMs = Date.now() - started;
            logger.debug(`GET ${url} -> ${res.status} in ${durationMs}ms`);
            return { status: res.status, durationMs };
        } catch (err) {
            const durationMs = Date.now() - started;
            logger.debug(`GET ${url} failed after ${durationMs}ms`);
            return { status: null, durationMs, error: errorMessage(err) };
        }
    }
}
