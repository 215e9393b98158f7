/**
 * Receiver configuration schema.
 * @module config
 */
import {z} from 'zod';

import {ReceiverError} from './protocol/errors';

const positiveMs = z.number().int().positive();

export const tuningSchema = z.object({
    connectTimeoutMs: positiveMs.optional(),
    reconnectDelayMs: positiveMs.optional(),
    reconnectMaxDelayMs: positiveMs.optional(),
    reconnectJitter: z.number().min(0).max(0.9).optional(),
    heartbeatIntervalMs: z.number().int().nonnegative().optional(),
    idleTimeoutMs: z.number().int().nonnegative().optional(),
    ackTimeoutMs: positiveMs.optional(),
    maxRetries: z.number().int().min(0).max(10).optional(),
    limitedControlThreshold: z.number().int().positive().optional(),
});

export const receiverConfigSchema = z.object({
    /** Hostname or IP address of the receiver. The control port is fixed. */
    host: z.string().trim().min(1),
    identifier: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    tuning: tuningSchema.optional(),
});

export type ReceiverConfig = z.infer<typeof receiverConfigSchema>;
export type ReceiverTuning = z.infer<typeof tuningSchema>;

/**
 * Validate untrusted configuration input.
 * Throws `ReceiverError(code=CONFIG_INVALID)` listing the zod issues.
 */
export const parseReceiverConfig = (input: unknown): ReceiverConfig => {
    const result = receiverConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ReceiverError({
            message: `Invalid receiver configuration: ${result.error.issues
                .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
                .join('; ')}`,
            domain: 'config',
            code: 'CONFIG_INVALID',
            details: {issues: result.error.issues},
        });
    }
    return result.data;
};

/** Read `JBL_HOST`, `JBL_NAME` and `LOG_LEVEL` from an environment map. */
export const loadReceiverConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): ReceiverConfig =>
    parseReceiverConfig({
        host: env.JBL_HOST,
        name: env.JBL_NAME,
        logLevel: env.LOG_LEVEL,
    });
