/**
 * Green-standby inference.
 * @module core/limited-control
 *
 * In green standby the receiver keeps mains power but switches its IP
 * control interface off, so connections get refused or commands go
 * unanswered. Nothing on the wire says so; this tracks consecutive failures
 * and trips once enough pile up after the receiver has been reached at least
 * once.
 */
import {RECEIVER_DEFAULT_LIMITED_CONTROL_THRESHOLD} from '../protocol/constants';
import type {ReceiverError} from '../protocol/errors';

export type LimitedControlOptions = {
    /** Consecutive failures before control counts as limited. */
    threshold?: number;
};

/** Socket error codes that look like a deliberately closed control port. */
const REFUSAL_CODES: ReadonlySet<string> = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EHOSTUNREACH']);

export class LimitedControlDetector {
    private readonly threshold: number;
    private failures = 0;
    private reachedOnce = false;
    private limited = false;

    constructor(options: LimitedControlOptions = {}) {
        this.threshold = options.threshold ?? RECEIVER_DEFAULT_LIMITED_CONTROL_THRESHOLD;
    }

    public isLimited(): boolean {
        return this.limited;
    }

    /**
     * The receiver answered. Clears the inference.
     * @returns `true` when the limited flag changed.
     */
    public recordResponse(): boolean {
        this.reachedOnce = true;
        this.failures = 0;
        return this.update(false);
    }

    /** @returns `true` when the limited flag changed. */
    public recordCommandTimeout(): boolean {
        this.failures += 1;
        return this.evaluate();
    }

    /**
     * Counts refusals and timeouts; other failures (DNS, bad host) do not
     * point at green standby and are ignored.
     * @returns `true` when the limited flag changed.
     */
    public recordConnectFailure(error: ReceiverError): boolean {
        const errno = error.details?.errno;
        const timedOut = error.code === 'CONNECTION_LOST' && errno === undefined;
        if (!timedOut && !(typeof errno === 'string' && REFUSAL_CODES.has(errno))) {
            return false;
        }
        this.failures += 1;
        return this.evaluate();
    }

    private evaluate(): boolean {
        return this.update(this.reachedOnce && this.failures >= this.threshold);
    }

    private update(next: boolean): boolean {
        if (next === this.limited) return false;
        this.limited = next;
        return true;
    }
}
