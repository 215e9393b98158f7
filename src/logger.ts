/**
 * Logging setup.
 * @module logger
 */
import pino, {type Logger} from 'pino';

export type {Logger};

let root: Logger | null = null;

const rootLogger = (): Logger => {
    if (!root) {
        root = pino({
            name: 'jbl-ma-control',
            level: process.env.LOG_LEVEL ?? 'info',
        });
    }
    return root;
};

/**
 * Child logger tagged with `component`. Classes take an optional `logger` option
 * and fall back to this.
 */
export const createLogger = (component: string, bindings: Record<string, unknown> = {}): Logger =>
    rootLogger().child({component, ...bindings});

/** Logger that drops everything. */
export const silentLogger = (): Logger => pino({level: 'silent'});
