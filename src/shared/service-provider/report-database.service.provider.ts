/**
 * Read-only handle on the application database for the console routes
 * @license MIT
 */
import { Injectable } from "@albertoielpo/ielpify";
import { loadConfig } from "../../common/config";
import { Logger } from "../../common/logger";
import { onShutdown } from "../../common/shutdown";
import { SqliteServiceProvider } from "./sqlite.service.provider";

const logger = new Logger("ReportDatabaseServiceProvider");

/**
 * Path comes from OPS_DB_PATH. The file is opened on first use, so a
 * missing database shows up as a failing health check, not a failed boot.
 */
@Injectable()
export class ReportDatabaseServiceProvider extends SqliteServiceProvider {
    constructor() {
        super(loadConfig().databasePath, true);
        onShutdown("report database", () => this.close());
        logger.notice(`Database: ${this.path}`);
    }
}
