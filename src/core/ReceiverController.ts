/**
 * High-level receiver client: one connection, one state, typed control methods.
 * @module core/ReceiverController
 */
import {EventEmitter} from 'events';

import {Command, EQ_MAX_DB, EQ_MIN_DB, VOLUME_MAX, VOLUME_MIN, type InputSource, type IrKey, type SurroundMode} from '../protocol/constants';
import {hasExtendedFeatures} from '../protocol/capabilities';
import type {StatusFrame} from '../protocol/frame';
import {ReceiverError} from '../protocol/errors';
import type {ReceiverConfig} from '../config';
import {createLogger, type Logger} from '../logger';
import {ReceiverConnection, type ReceiverConnectionOptions} from './connection';
import {StateSynchronizer} from './state';
import {CommandDispatcher, type CommandOutcome} from './dispatcher';
import type {ReceiverState, StateChange} from './types';

/**
 * Configuration for the receiver controller.
 */
export type ReceiverControllerOptions = Omit<ReceiverConnectionOptions, 'logger'> & {
    /** Display name used in log bindings. */
    name?: string;
    /** Stable receiver ID used in log bindings. */
    identifier?: string;
    /** Reply window per command attempt in milliseconds. */
    ackTimeoutMs?: number;
    /** Resends of an unacknowledged command. */
    maxRetries?: number;
    /** Consecutive failures before green standby is assumed. */
    limitedControlThreshold?: number;
    logger?: Logger;
};

export interface ReceiverControllerEvents {
    /** Whole-state snapshot after connect and disconnect. */
    state: [state: Readonly<ReceiverState>];
    change: [changes: StateChange[], state: Readonly<ReceiverState>];
    connect: [];
    disconnect: [reason: ReceiverError];
}

/** Queried after every connect, in this order, behind the initialization request. */
const STATUS_QUERIES: readonly Command[] = [
    Command.Power,
    Command.Volume,
    Command.Mute,
    Command.InputSource,
    Command.SurroundMode,
    Command.DisplayDim,
    Command.TrebleEq,
    Command.BassEq,
    Command.RoomEq,
    Command.DialogEnhanced,
    Command.DolbyAudioMode,
    Command.StreamingState,
];

/** Only answered by models with party features. */
const EXTENDED_QUERIES: readonly Command[] = [Command.PartyMode, Command.PartyVolume, Command.Drc];

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

/** Facade over {@link ReceiverConnection}, {@link StateSynchronizer} and {@link CommandDispatcher}. */
export class ReceiverController extends EventEmitter<ReceiverControllerEvents> {
    public readonly connection: ReceiverConnection;
    public readonly synchronizer: StateSynchronizer;
    public readonly dispatcher: CommandDispatcher;
    public readonly logger: Logger;

    /**
     * @param options Host, timing and logging settings. Nothing connects until {@link start}.
     */
    constructor(options: ReceiverControllerOptions) {
        super();
        this.logger = options.logger ?? createLogger('controller', {host: options.host, name: options.name, identifier: options.identifier});
        this.connection = new ReceiverConnection({...options, logger: this.logger.child({scope: 'connection'})});
        this.synchronizer = new StateSynchronizer({
            limitedControlThreshold: options.limitedControlThreshold,
            logger: this.logger.child({scope: 'state'}),
        });
        this.dispatcher = new CommandDispatcher({
            transport: this.connection,
            synchronizer: this.synchronizer,
            ackTimeoutMs: options.ackTimeoutMs,
            maxRetries: options.maxRetries,
            logger: this.logger.child({scope: 'dispatcher'}),
        });

        this.connection.on('frame', (frame) => this.onFrame(frame));
        this.connection.on('connect', () => this.onConnect());
        this.connection.on('disconnect', (reason) => this.onDisconnect(reason));
        this.connection.on('connectFailed', (error) => {
            this.synchronizer.recordConnectFailure(error);
        });
        this.synchronizer.on('snapshot', (state) => this.emit('state', state));
        this.synchronizer.on('change', (changes, state) => this.emit('change', changes, state));
    }

    /** Build a controller from a validated {@link ReceiverConfig}. */
    public static fromConfig(config: ReceiverConfig, logger?: Logger): ReceiverController {
        const bindings = {host: config.host, name: config.name, identifier: config.identifier};
        const log = logger ? logger.child(bindings) : createLogger('controller', bindings);
        if (!logger && config.logLevel) log.level = config.logLevel;
        return new ReceiverController({
            ...config.tuning,
            host: config.host,
            name: config.name,
            identifier: config.identifier,
            logger: log,
        });
    }

    public getState(): Readonly<ReceiverState> {
        return this.synchronizer.getState();
    }

    /**
     * Connect and keep reconnecting until {@link stop}. Resolves after the first
     * attempt settles; a failed first attempt is logged and retried in the background.
     */
    public async start(): Promise<void> {
        try {
            await this.connection.connect();
        } catch (err) {
            this.logger.warn({err: err instanceof Error ? err.message : String(err)}, 'Initial connect failed, retrying');
        }
    }

    /** Close the session for good and reject whatever is still pending. */
    public stop(): void {
        this.connection.shutdown();
        this.dispatcher.cancelAll(new ReceiverError({
            message: 'Controller stopped',
            domain: 'transport',
            code: 'CONNECTION_CLOSED',
        }));
    }

    public setPower(on: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('power', on);
    }

    public setVolume(level: number): Promise<CommandOutcome> {
        return this.dispatcher.issue('volume', level);
    }

    /**
     * Step the volume from the current (or queued) level, clamped to 0-99.
     * Rejects with `ENCODING_ERROR` while the level is unknown.
     */
    public volumeUp(step = 1): Promise<CommandOutcome> {
        return this.stepVolume(step);
    }

    public volumeDown(step = 1): Promise<CommandOutcome> {
        return this.stepVolume(-step);
    }

    public setMuted(muted: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('mute', muted);
    }

    public toggleMute(): Promise<CommandOutcome> {
        return this.setMuted(this.getState().muted !== true);
    }

    public selectInput(input: InputSource): Promise<CommandOutcome> {
        return this.dispatcher.issue('input', input);
    }

    public setSurroundMode(mode: SurroundMode): Promise<CommandOutcome> {
        return this.dispatcher.issue('surroundMode', mode);
    }

    /** 0 off, 1 dim, 2 mid, 3 bright. */
    public setDisplayDim(level: number): Promise<CommandOutcome> {
        return this.dispatcher.issue('displayDim', level);
    }

    public setPartyMode(on: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('partyMode', on);
    }

    public setPartyVolume(level: number): Promise<CommandOutcome> {
        return this.dispatcher.issue('partyVolume', level);
    }

    public setTrebleEq(db: number): Promise<CommandOutcome> {
        return this.dispatcher.issue('trebleEq', clamp(db, EQ_MIN_DB, EQ_MAX_DB));
    }

    public setBassEq(db: number): Promise<CommandOutcome> {
        return this.dispatcher.issue('bassEq', clamp(db, EQ_MIN_DB, EQ_MAX_DB));
    }

    public setRoomEq(on: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('roomEq', on);
    }

    public setDialogEnhanced(on: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('dialogEnhanced', on);
    }

    public setDolbyAudioMode(on: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('dolbyAudioMode', on);
    }

    public setDrc(on: boolean): Promise<CommandOutcome> {
        return this.dispatcher.issue('drc', on);
    }

    /** Simulate a remote control key press. */
    public pressKey(key: IrKey | number): Promise<void> {
        return this.dispatcher.sendKey(key);
    }

    public reboot(): Promise<void> {
        return this.dispatcher.sendRaw(Command.Reboot);
    }

    /** Re-query every status the receiver reports. */
    public async refresh(): Promise<void> {
        await this.dispatcher.query(Command.Initialization);
        for (const command of this.statusQueries()) {
            await this.dispatcher.query(command);
        }
    }

    private stepVolume(delta: number): Promise<CommandOutcome> {
        const queued = this.dispatcher.pending('volume').at(-1);
        const base = queued && typeof queued.value === 'number' ? queued.value : this.getState().volume;
        if (base === null) {
            return Promise.reject(new ReceiverError({
                message: 'Current volume is unknown',
                domain: 'command',
                code: this.connection.isConnected() ? 'ENCODING_ERROR' : 'NOT_CONNECTED',
            }));
        }
        return this.setVolume(clamp(base + delta, VOLUME_MIN, VOLUME_MAX));
    }

    private statusQueries(): Command[] {
        const {model} = this.getState();
        return model !== null && hasExtendedFeatures(model) ? [...STATUS_QUERIES, ...EXTENDED_QUERIES] : [...STATUS_QUERIES];
    }

    private onConnect(): void {
        this.synchronizer.markConnected();
        this.emit('connect');
        this.refresh().catch((err) => {
            this.logger.debug({err: err instanceof Error ? err.message : String(err)}, 'Status queries interrupted');
        });
    }

    private onDisconnect(reason: ReceiverError): void {
        this.dispatcher.cancelAll(reason);
        this.synchronizer.markDisconnected();
        this.emit('disconnect', reason);
    }

    private onFrame(frame: StatusFrame): void {
        const modelBefore = this.getState().model;
        this.synchronizer.applyFrame(frame);
        this.dispatcher.handleFrame(frame);

        const {model} = this.getState();
        if (modelBefore === null && model !== null && hasExtendedFeatures(model)) {
            this.queryExtended().catch((err) => {
                this.logger.debug({err: err instanceof Error ? err.message : String(err)}, 'Extended queries interrupted');
            });
        }
    }

    private async queryExtended(): Promise<void> {
        for (const command of EXTENDED_QUERIES) {
            await this.dispatcher.query(command);
        }
    }
}
