/**
 * Canonical receiver state and its change stream.
 * @module core/state
 */
import {EventEmitter} from 'events';

import {parseStatus} from '../protocol/commands';
import {isErrorResponse, type StatusFrame} from '../protocol/frame';
import type {ReceiverError} from '../protocol/errors';
import {createLogger, type Logger} from '../logger';
import {LimitedControlDetector} from './limited-control';
import {
    RECEIVER_FIELDS,
    STATE_FIELDS,
    unknownFields,
    type ReceiverFields,
    type ReceiverState,
    type StateChange,
} from './types';

export type StateSynchronizerOptions = {
    /** Consecutive failures before green standby is assumed. */
    limitedControlThreshold?: number;
    logger?: Logger;
};

/**
 * Typed event map emitted by {@link StateSynchronizer}.
 */
export interface StateSynchronizerEvents {
    /** Fields that changed, with the resulting snapshot. */
    change: [changes: StateChange[], state: Readonly<ReceiverState>];
    /** Whole-state replacement on connect and on disconnect. */
    snapshot: [state: Readonly<ReceiverState>];
}

export type ReconcileResult = 'acknowledged' | 'rejected' | 'unrelated';

/** The parts of a pending command that reconciliation looks at. */
export type ReconcileTarget = {
    command: number;
    expected: Partial<ReceiverFields>;
};

const withoutFields = (source: Partial<ReceiverFields>, remove: Partial<ReceiverFields>): Partial<ReceiverFields> => {
    const next: Partial<ReceiverFields> = {...source};
    for (const key of RECEIVER_FIELDS) {
        if (key in remove) delete next[key];
    }
    return next;
};

/**
 * Sole writer of {@link ReceiverState}. Device-reported values always replace
 * optimistic ones; readers only ever see frozen snapshots.
 */
export class StateSynchronizer extends EventEmitter<StateSynchronizerEvents> {
    private readonly detector: LimitedControlDetector;
    private readonly log: Logger;
    private confirmed: ReceiverFields = unknownFields();
    private optimistic: Partial<ReceiverFields> = {};
    private connected = false;
    private current: Readonly<ReceiverState>;

    constructor(options: StateSynchronizerOptions = {}) {
        super();
        this.detector = new LimitedControlDetector({threshold: options.limitedControlThreshold});
        this.log = options.logger ?? createLogger('state');
        this.current = Object.freeze(this.compose());
    }

    /** Current frozen snapshot. */
    public getState(): Readonly<ReceiverState> {
        return this.current;
    }

    /**
     * Apply one decoded receiver frame.
     * Unknown command codes and error responses are logged and leave the state alone.
     * @returns The changed fields (empty when nothing changed).
     */
    public applyFrame(frame: StatusFrame): StateChange[] {
        this.detector.recordResponse();
        if (isErrorResponse(frame)) {
            this.log.debug({command: frame.command, responseCode: frame.responseCode}, 'Receiver returned an error response');
            return this.commit();
        }

        const fields = parseStatus(frame);
        if (fields === null) {
            this.log.info({command: frame.command, data: frame.data.toString('hex')}, 'Ignoring unrecognized status code');
            return this.commit();
        }

        this.confirmed = {...this.confirmed, ...fields};
        this.optimistic = withoutFields(this.optimistic, fields);
        return this.commit();
    }

    /**
     * Overlay the values a just-sent command is expected to produce.
     */
    public applyOptimistic(expected: Partial<ReceiverFields>): StateChange[] {
        this.optimistic = {...this.optimistic, ...expected};
        return this.commit();
    }

    /** Drop the optimistic overlay of a command that failed. */
    public revertOptimistic(expected: Partial<ReceiverFields>): StateChange[] {
        this.optimistic = withoutFields(this.optimistic, expected);
        return this.commit();
    }

    /**
     * Decide whether `frame` settles `pending`. The frame has already been applied,
     * so whatever the receiver reported is what the state now holds.
     */
    public reconcile(pending: ReconcileTarget, frame: StatusFrame): ReconcileResult {
        if (frame.command !== pending.command) return 'unrelated';
        this.optimistic = withoutFields(this.optimistic, pending.expected);
        this.commit();
        return isErrorResponse(frame) ? 'rejected' : 'acknowledged';
    }

    /** A session opened. Emits one `snapshot`. */
    public markConnected(): void {
        this.connected = true;
        this.detector.recordResponse();
        this.replace();
    }

    /** The session ended. Every device field becomes unknown; emits one `snapshot`. */
    public markDisconnected(): void {
        this.connected = false;
        this.confirmed = unknownFields();
        this.optimistic = {};
        this.replace();
    }

    public recordCommandTimeout(): StateChange[] {
        return this.detector.recordCommandTimeout() ? this.commit() : [];
    }

    public recordConnectFailure(error: ReceiverError): StateChange[] {
        return this.detector.recordConnectFailure(error) ? this.commit() : [];
    }

    private compose(): ReceiverState {
        const fields: ReceiverFields = {...this.confirmed, ...this.optimistic};
        const limitedControl = this.detector.isLimited();
        return {
            ...fields,
            power: limitedControl ? 'green-standby' : fields.power,
            connected: this.connected,
            limitedControl,
        };
    }

    private replace(): void {
        this.current = Object.freeze(this.compose());
        this.emit('snapshot', this.current);
    }

    private commit(): StateChange[] {
        const previous = this.current;
        const next = Object.freeze(this.compose());
        const changes: StateChange[] = [];
        for (const field of STATE_FIELDS) {
            if (previous[field] !== next[field]) changes.push({field, value: next[field]});
        }
        this.current = next;
        if (changes.length > 0) {
            this.log.debug({changes}, 'State changed');
            this.emit('change', changes, next);
        }
        return changes;
    }
}
