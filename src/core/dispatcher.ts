/**
 * Turns control intents into frames and matches them with the receiver's replies.
 * @module core/dispatcher
 *
 * Each axis holds at most one command in flight and one queued successor.
 * A newer intent replaces the queued one, so a burst of slider moves sends
 * the first and the last value only. A command already on the wire is not
 * cancelled: replies carry no transaction ID, so a late reply to it would be
 * taken as the acknowledgment of its replacement.
 */
import {
    Command,
    RECEIVER_DEFAULT_ACK_TIMEOUT_MS,
    RECEIVER_DEFAULT_MAX_RETRIES,
    type IrKey,
} from '../protocol/constants';
import {
    axisCodec,
    axisForCommand,
    encodeIntent,
    encodeIrKey,
    encodeQuery,
    parseStatus,
    type Axis,
    type AxisValueMap,
} from '../protocol/commands';
import {encodeCommand, type StatusFrame} from '../protocol/frame';
import {mapResponseCodeToError, ReceiverError} from '../protocol/errors';
import {createLogger, type Logger} from '../logger';
import type {StateSynchronizer} from './state';
import {RECEIVER_FIELDS, type ReceiverFields} from './types';

/** The slice of {@link ReceiverConnection} the dispatcher writes through. */
export interface CommandTransport {
    send(frame: Buffer): Promise<number>;
    isConnected(): boolean;
}

export type CommandOutcome =
    | {status: 'acknowledged'; reported: Partial<ReceiverFields>}
    | {status: 'unchanged'}
    | {status: 'superseded'};

export type CommandDispatcherOptions = {
    transport: CommandTransport;
    synchronizer: StateSynchronizer;
    /** Wait this long for a reply before resending. */
    ackTimeoutMs?: number;
    /** Resends after the first attempt before giving up. */
    maxRetries?: number;
    logger?: Logger;
};

export type PendingCommand = {
    axis: Axis;
    value: AxisValueMap[Axis];
    command: Command;
    frame: Buffer;
    expected: Partial<ReceiverFields>;
    issuedAt: number;
    /** Connection sequence of the latest write, `null` until written. */
    sequence: number | null;
    retries: number;
    timer: NodeJS.Timeout | null;
    resolve: (outcome: CommandOutcome) => void;
    reject: (error: ReceiverError) => void;
};

type AxisSlot = {
    inFlight: PendingCommand | null;
    next: PendingCommand | null;
    flushScheduled: boolean;
};

const toReceiverError = (err: unknown): ReceiverError => {
    if (err instanceof ReceiverError) return err;
    return new ReceiverError({
        message: err instanceof Error ? err.message : 'Write failed',
        domain: 'transport',
        code: 'CONNECTION_LOST',
        cause: err,
    });
};

export class CommandDispatcher {
    private readonly transport: CommandTransport;
    private readonly synchronizer: StateSynchronizer;
    private readonly ackTimeoutMs: number;
    private readonly maxRetries: number;
    private readonly log: Logger;
    private readonly slots = new Map<Axis, AxisSlot>();

    constructor(options: CommandDispatcherOptions) {
        this.transport = options.transport;
        this.synchronizer = options.synchronizer;
        this.ackTimeoutMs = options.ackTimeoutMs ?? RECEIVER_DEFAULT_ACK_TIMEOUT_MS;
        this.maxRetries = options.maxRetries ?? RECEIVER_DEFAULT_MAX_RETRIES;
        this.log = options.logger ?? createLogger('dispatcher');
    }

    /**
     * Issue an intent on `axis`.
     *
     * Rejects with `ENCODING_ERROR` for values the receiver cannot take,
     * `NOT_CONNECTED` or `LIMITED_CONTROL` outside a session, `COMMAND_REJECTED`
     * when the receiver answers with an error code, `COMMAND_TIMEOUT` after the
     * last retry and `CONNECTION_LOST`/`CONNECTION_CLOSED` when the session ends
     * first.
     */
    public issue<A extends Axis>(axis: A, value: AxisValueMap[A]): Promise<CommandOutcome> {
        const state = this.synchronizer.getState();
        let frame: Buffer;
        try {
            frame = encodeIntent(axis, value, state.model);
        } catch (err) {
            return Promise.reject(toReceiverError(err));
        }
        if (!this.transport.isConnected()) {
            return Promise.reject(this.unavailableError(state.limitedControl));
        }

        const codec = axisCodec(axis);
        const expected = codec.expected(value);
        const slot = this.slot(axis);
        if (!slot.inFlight && !slot.next && this.isCurrent(expected)) {
            this.log.debug({axis, value}, 'State already holds value, not sending');
            return Promise.resolve({status: 'unchanged'});
        }

        return new Promise<CommandOutcome>((resolve, reject) => {
            const pending: PendingCommand = {
                axis,
                value,
                command: codec.command,
                frame,
                expected,
                issuedAt: Date.now(),
                sequence: null,
                retries: 0,
                timer: null,
                resolve,
                reject,
            };
            if (slot.next) {
                this.log.debug({axis}, 'Queued command superseded');
                slot.next.resolve({status: 'superseded'});
            }
            slot.next = pending;
            if (!slot.inFlight) this.scheduleFlush(axis, slot);
        });
    }

    /** Ask the receiver for the current value of `command`. Not tracked. */
    public async query(command: Command): Promise<void> {
        await this.sendUntracked(encodeQuery(command));
    }

    /** Send one simulated IR key press. Resolves once written. */
    public async sendKey(code: IrKey | number): Promise<void> {
        await this.sendUntracked(encodeIrKey(code));
    }

    /** Send an operand-less command such as {@link Command.Reboot}. Not tracked. */
    public async sendRaw(command: Command): Promise<void> {
        await this.sendUntracked(encodeCommand(command));
    }

    /**
     * Route an applied status frame to the command waiting on its axis.
     * Call after {@link StateSynchronizer.applyFrame} has seen the same frame.
     */
    public handleFrame(frame: StatusFrame): void {
        const axis = axisForCommand(frame.command);
        if (axis === undefined) return;
        const slot = this.slots.get(axis);
        const pending = slot?.inFlight;
        if (!slot || !pending) return;

        const result = this.synchronizer.reconcile(pending, frame);
        if (result === 'unrelated') return;
        this.settle(slot, pending);
        if (result === 'acknowledged') {
            pending.resolve({status: 'acknowledged', reported: parseStatus(frame) ?? {}});
        } else {
            pending.reject(mapResponseCodeToError(frame.responseCode, frame.command, {axis}));
        }
        this.flush(axis, slot);
    }

    /** Reject every in-flight and queued command with `reason`. */
    public cancelAll(reason: ReceiverError): void {
        for (const [axis, slot] of this.slots) {
            const {inFlight, next} = slot;
            slot.inFlight = null;
            slot.next = null;
            if (inFlight) {
                if (inFlight.timer) clearTimeout(inFlight.timer);
                inFlight.timer = null;
                this.log.debug({axis, code: reason.code}, 'In-flight command cancelled');
                inFlight.reject(reason);
            }
            next?.reject(reason);
        }
        this.slots.clear();
    }

    /** Commands waiting on `axis`: in flight first, then queued. */
    public pending(axis: Axis): PendingCommand[] {
        const slot = this.slots.get(axis);
        if (!slot) return [];
        return [slot.inFlight, slot.next].filter((entry): entry is PendingCommand => entry !== null);
    }

    private async sendUntracked(frame: Buffer): Promise<void> {
        if (!this.transport.isConnected()) {
            throw this.unavailableError(this.synchronizer.getState().limitedControl);
        }
        await this.transport.send(frame);
    }

    private unavailableError(limited: boolean): ReceiverError {
        if (limited) {
            return new ReceiverError({
                message: 'Receiver appears to be in green standby with IP control disabled',
                domain: 'command',
                code: 'LIMITED_CONTROL',
            });
        }
        return new ReceiverError({
            message: 'Receiver is not connected',
            domain: 'transport',
            code: 'NOT_CONNECTED',
        });
    }

    private slot(axis: Axis): AxisSlot {
        let slot = this.slots.get(axis);
        if (!slot) {
            slot = {inFlight: null, next: null, flushScheduled: false};
            this.slots.set(axis, slot);
        }
        return slot;
    }

    private isCurrent(expected: Partial<ReceiverFields>): boolean {
        const state = this.synchronizer.getState();
        const keys = RECEIVER_FIELDS.filter((key) => key in expected);
        return keys.length > 0 && keys.every((key) => state[key] === expected[key]);
    }

    private scheduleFlush(axis: Axis, slot: AxisSlot): void {
        if (slot.flushScheduled) return;
        slot.flushScheduled = true;
        queueMicrotask(() => {
            slot.flushScheduled = false;
            this.flush(axis, slot);
        });
    }

    private flush(axis: Axis, slot: AxisSlot): void {
        if (slot.inFlight || !slot.next) return;
        const pending = slot.next;
        slot.next = null;
        if (this.isCurrent(pending.expected)) {
            pending.resolve({status: 'unchanged'});
            return;
        }
        slot.inFlight = pending;
        this.synchronizer.applyOptimistic(pending.expected);
        this.transmit(axis, slot, pending);
    }

    private transmit(axis: Axis, slot: AxisSlot, pending: PendingCommand): void {
        pending.timer = setTimeout(() => this.onTimeout(axis, slot, pending), this.ackTimeoutMs);
        this.transport.send(pending.frame).then((sequence) => {
            pending.sequence = sequence;
        }).catch((err) => {
            this.fail(axis, slot, pending, toReceiverError(err));
        });
    }

    private onTimeout(axis: Axis, slot: AxisSlot, pending: PendingCommand): void {
        pending.timer = null;
        if (slot.inFlight !== pending) return;

        if (slot.next) {
            this.log.debug({axis}, 'Unacknowledged command superseded at retry');
            slot.inFlight = null;
            this.synchronizer.revertOptimistic(pending.expected);
            pending.resolve({status: 'superseded'});
            this.flush(axis, slot);
            return;
        }
        if (pending.retries < this.maxRetries) {
            pending.retries += 1;
            this.log.debug({axis, retry: pending.retries}, 'No acknowledgment, resending');
            this.transmit(axis, slot, pending);
            return;
        }

        this.log.warn({axis, attempts: pending.retries + 1}, 'Command timed out');
        this.synchronizer.recordCommandTimeout();
        this.fail(axis, slot, pending, new ReceiverError({
            message: `No acknowledgment for ${axis} after ${pending.retries + 1} attempts`,
            domain: 'command',
            code: 'COMMAND_TIMEOUT',
            details: {axis, retries: pending.retries},
        }));
    }

    private fail(axis: Axis, slot: AxisSlot, pending: PendingCommand, error: ReceiverError): void {
        if (slot.inFlight !== pending) return;
        this.settle(slot, pending);
        this.synchronizer.revertOptimistic(pending.expected);
        pending.reject(error);
        this.flush(axis, slot);
    }

    private settle(slot: AxisSlot, pending: PendingCommand): void {
        if (pending.timer) clearTimeout(pending.timer);
        pending.timer = null;
        slot.inFlight = null;
    }
}
