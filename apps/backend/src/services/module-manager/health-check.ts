import type { IHealthSnapshot, ILogger, IModule } from '@everly/types';
import { describeError, HealthCheckTimeoutError } from './errors.js';

/**
 * Run one module's health check with an upper bound on the wait.
 *
 * Never rejects. A check that throws or rejects becomes an unhealthy snapshot
 * with the message under `detail.error`; a check that outlives `timeoutMs`
 * becomes `{ error: 'timeout', timeoutMs }` and its signal is aborted. A late
 * settlement of a timed-out check is logged and otherwise ignored.
 *
 * The snapshot always carries the registered module name, whatever the
 * module put in `moduleName`.
 */
export async function checkModuleHealth(
    module: IModule,
    moduleName: string,
    timeoutMs: number,
    logger: ILogger
): Promise<IHealthSnapshot> {
    const controller = new AbortController();
    const timedOut = Symbol('timeout');
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<typeof timedOut>(resolve => {
        timeoutHandle = setTimeout(() => resolve(timedOut), timeoutMs);
    });
    const healthPromise = Promise.resolve().then(() => module.health(controller.signal));

    try {
        const result = await Promise.race([healthPromise, timeoutPromise]);

        if (result === timedOut) {
            const error = new HealthCheckTimeoutError(moduleName, timeoutMs);
            controller.abort(error);
            logger.warn({ module: moduleName, timeoutMs }, error.message);
            healthPromise.catch(lateError => {
                logger.debug({ module: moduleName, error: lateError }, 'Health check rejected after timeout');
            });
            return {
                moduleName,
                healthy: false,
                detail: { error: 'timeout', timeoutMs },
                checkedAt: new Date()
            };
        }

        return { ...result, moduleName };
    } catch (error) {
        logger.warn({ module: moduleName, error }, 'Health check failed');
        return {
            moduleName,
            healthy: false,
            detail: { error: describeError(error) },
            checkedAt: new Date()
        };
    } finally {
        if (timeoutHandle) {
            clearTimeout(timeoutHandle);
        }
    }
}
