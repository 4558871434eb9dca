/**
 * Operator alerts delivered through the Resend e-mail API
 * @license MIT
 */
import axios, { type AxiosInstance } from "axios";
import { Logger } from "../../common/logger";

const logger = new Logger("AlertServiceProvider");

export interface AlertSender {
    /** Resolves false when alerting is not configured, throws when delivery fails. */
    send(subject: string, text: string): Promise<boolean>;
}

type ResendResponse = { id?: unknown };

export class ResendAlertServiceProvider implements AlertSender {
    constructor(
        private readonly apiKey: string,
        private readonly from: string,
        private readonly to: string[],
        private readonly http: AxiosInstance = axios.create({
            baseURL: "https://api.resend.com",
            timeout: 10_000
        })
    ) {
        if (!apiKey) {
            logger.warn("RESEND_API_KEY is not set, alerts will only be logged");
        }
    }

    async send(subject: string, text: string): Promise<boolean> {
        if (!this.apiKey || this.to.length === 0) {
            logger.warn(`[alert not delivered] ${subject}`);
            return false;
        }

        const res = await this.http.post<ResendResponse>(
            "/emails",
            { from: this.from, to: this.to, subject, text },
            { headers: { Authorization: `Bearer ${this.apiKey}` } }
        );

        if (typeof res.data?.id !== "string") {
            throw new Error(
                `Resend API error (${res.status}): ${JSON.stringify(res.data)}`
            );
        }
        logger.notice(`Alert sent via Resend. ID: ${res.data.id}`);
        return true;
    }
}
