import type { IDatabaseService } from '../database/IDatabaseService.js';
import type { ILogger } from '../logging/ILogger.js';
import type { ICacheService } from '../services/ICacheService.js';

/**
 * Process-owned handles passed to every module's `initialize()`.
 *
 * The entry point builds these once and the module manager hands the same
 * object to every module. Their lifetime is the process lifetime: modules
 * borrow them and must never close them.
 */
export interface ISharedInfrastructure {
    /** MongoDB access through the process's single connection. */
    database: IDatabaseService;

    /** Redis-backed cache, absent when no `REDIS_URL` is configured. */
    cache?: ICacheService;

    /** Root application logger; modules bind their own child. */
    logger: ILogger;
}
