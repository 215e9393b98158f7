/**
 * TCP session to one receiver: connect, read loop, serialized writes, liveness and reconnect.
 * @module core/connection
 */
import * as net from 'net';
import type {Socket} from 'net';
import {EventEmitter} from 'events';

import {
    Command,
    RECEIVER_DEFAULT_CONNECT_TIMEOUT_MS,
    RECEIVER_DEFAULT_HEARTBEAT_MS,
    RECEIVER_DEFAULT_IDLE_TIMEOUT_MS,
    RECEIVER_DEFAULT_MAX_BUFFER_BYTES,
    RECEIVER_DEFAULT_RECONNECT_DELAY_MS,
    RECEIVER_DEFAULT_RECONNECT_JITTER,
    RECEIVER_DEFAULT_RECONNECT_MAX_DELAY_MS,
    RECEIVER_PORT,
} from '../protocol/constants';
import {encodeCommand, extractStatusFrames, type StatusFrame} from '../protocol/frame';
import {ReceiverError} from '../protocol/errors';
import {createLogger, type Logger} from '../logger';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/**
 * Configuration for a {@link ReceiverConnection}.
 */
export type ReceiverConnectionOptions = {
    /** Receiver hostname or IP address. The port is always {@link RECEIVER_PORT}. */
    host: string;
    /** Optional local interface address to bind for outbound connections. */
    localAddress?: string;
    /** Reconnect after unexpected disconnects and failed attempts. Default: `true`. */
    autoReconnect?: boolean;
    /** Abort a connect attempt after this many milliseconds. */
    connectTimeoutMs?: number;
    /** Initial reconnect backoff delay in milliseconds. */
    reconnectDelayMs?: number;
    /** Maximum reconnect backoff delay in milliseconds. */
    reconnectMaxDelayMs?: number;
    /** Random extra delay as a fraction of the backoff step (0 disables jitter). */
    reconnectJitter?: number;
    /** Interval for heartbeat commands in milliseconds. `0` disables them. */
    heartbeatIntervalMs?: number;
    /** Force a reconnect when no frame arrives for this long. `0` disables the check. */
    idleTimeoutMs?: number;
    /** Undecodable bytes kept before the stream buffer is dropped. */
    maxBufferBytes?: number;
    /** Source of randomness for jitter. */
    random?: () => number;
    logger?: Logger;
};

/**
 * Typed event map emitted by {@link ReceiverConnection}.
 */
export interface ReceiverConnectionEvents {
    /** Lifecycle transitions. */
    state: [state: ConnectionState];
    /** Socket is open and the read loop is running. */
    connect: [];
    /** A connect attempt failed before the session opened. */
    connectFailed: [error: ReceiverError];
    /** An open session ended. */
    disconnect: [reason: ReceiverError];
    /** Emitted before automatic reconnect attempts. */
    reconnecting: [attempt: number, delayMs: number];
    /** Every decoded receiver frame, in wire order. */
    frame: [frame: StatusFrame];
    /** A span of bytes was skipped to regain framing. Never fatal. */
    invalidFrame: [error: ReceiverError];
    /** Emitted for each successful heartbeat write. */
    heartbeat: [];
}

export type BackoffOptions = {
    baseMs: number;
    maxMs: number;
    jitter: number;
};

/**
 * Delay before reconnect attempt `attempt` (1-based): exponential growth with
 * multiplicative jitter, capped at `maxMs`.
 */
export const computeReconnectDelay = (
    attempt: number,
    {baseMs, maxMs, jitter}: BackoffOptions,
    random: () => number = Math.random,
): number => {
    const step = baseMs * (2 ** Math.max(0, attempt - 1));
    return Math.min(Math.round(step * (1 + jitter * random())), maxMs);
};

const wrapSocketError = (err: unknown, fallback: string): ReceiverError => {
    if (err instanceof ReceiverError) return err;
    const message = err instanceof Error ? err.message : fallback;
    const details = err instanceof Error && 'code' in err ? {errno: err.code} : undefined;
    return new ReceiverError({
        message,
        domain: 'transport',
        code: 'CONNECTION_LOST',
        details,
        cause: err,
    });
};

/**
 * One long-lived control session. At most one socket and one read loop exist at a time.
 */
export class ReceiverConnection extends EventEmitter<ReceiverConnectionEvents> {
    public readonly host: string;
    public readonly port = RECEIVER_PORT;

    private readonly autoReconnect: boolean;
    private readonly connectTimeoutMs: number;
    private readonly backoff: BackoffOptions;
    private readonly heartbeatIntervalMs: number;
    private readonly idleTimeoutMs: number;
    private readonly maxBufferBytes: number;
    private readonly random: () => number;
    private readonly log: Logger;

    private socket: Socket | null = null;
    private streamBuffer: Buffer = Buffer.alloc(0);
    private connectPromise: Promise<void> | null = null;
    private state: ConnectionState = 'disconnected';
    private manualClose = false;
    private reconnectAttempts = 0;
    private reconnectTimer: NodeJS.Timeout | null = null;
    private heartbeatTimer: NodeJS.Timeout | null = null;
    private idleTimer: NodeJS.Timeout | null = null;
    private writeChain: Promise<void> = Promise.resolve();
    private sequence = 0;
    private lastActivityAt: number | null = null;

    constructor(private readonly options: ReceiverConnectionOptions) {
        super();
        this.host = options.host;
        this.autoReconnect = options.autoReconnect ?? true;
        this.connectTimeoutMs = options.connectTimeoutMs ?? RECEIVER_DEFAULT_CONNECT_TIMEOUT_MS;
        this.backoff = {
            baseMs: options.reconnectDelayMs ?? RECEIVER_DEFAULT_RECONNECT_DELAY_MS,
            maxMs: options.reconnectMaxDelayMs ?? RECEIVER_DEFAULT_RECONNECT_MAX_DELAY_MS,
            jitter: options.reconnectJitter ?? RECEIVER_DEFAULT_RECONNECT_JITTER,
        };
        this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? RECEIVER_DEFAULT_HEARTBEAT_MS;
        this.idleTimeoutMs = options.idleTimeoutMs ?? RECEIVER_DEFAULT_IDLE_TIMEOUT_MS;
        this.maxBufferBytes = options.maxBufferBytes ?? RECEIVER_DEFAULT_MAX_BUFFER_BYTES;
        this.random = options.random ?? Math.random;
        this.log = options.logger ?? createLogger('connection', {host: options.host});
    }

    /**
     * Opens the session. Concurrent calls share one attempt.
     * A failed attempt rejects and, unless shut down, schedules the next one.
     */
    public async connect(): Promise<void> {
        if (this.state === 'connected') return;
        if (this.connectPromise) return this.connectPromise;

        this.manualClose = false;
        this.stopReconnectTimer();
        this.connectPromise = this.connectInternal();
        try {
            await this.connectPromise;
        } finally {
            this.connectPromise = null;
        }
    }

    /**
     * Closes the socket, cancels every timer and stays disconnected until
     * {@link connect} is called again.
     */
    public shutdown(): void {
        this.manualClose = true;
        this.stopReconnectTimer();
        this.stopHeartbeat();
        this.stopIdleTimer();
        const wasConnected = this.state === 'connected';
        const socket = this.socket;
        this.socket = null;
        this.streamBuffer = Buffer.alloc(0);
        this.setState('disconnected');
        socket?.destroy();
        if (wasConnected) {
            this.emit('disconnect', new ReceiverError({
                message: 'Connection shut down',
                domain: 'transport',
                code: 'CONNECTION_CLOSED',
            }));
        }
    }

    public getState(): ConnectionState {
        return this.state;
    }

    public isConnected(): boolean {
        return this.state === 'connected';
    }

    /** Epoch milliseconds of the last decoded frame, or `null` before the first one. */
    public getLastActivity(): number | null {
        return this.lastActivityAt;
    }

    /** Sequence number of the most recent write. */
    public getSequence(): number {
        return this.sequence;
    }

    /**
     * Writes one encoded frame. Writes are serialized so frames never interleave.
     * Resolves with the write's sequence number.
     * Rejects with `ReceiverError(code=NOT_CONNECTED)` outside a session.
     */
    public send(frame: Buffer): Promise<number> {
        const socket = this.socket;
        if (this.state !== 'connected' || !socket) {
            return Promise.reject(new ReceiverError({
                message: `Receiver ${this.host} is not connected`,
                domain: 'transport',
                code: 'NOT_CONNECTED',
            }));
        }
        this.sequence += 1;
        const sequence = this.sequence;
        const write = this.writeChain.then(() => this.writeFrame(socket, frame));
        this.writeChain = write.catch(() => undefined);
        return write.then(() => sequence);
    }

    private writeFrame(socket: Socket, frame: Buffer): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (this.socket !== socket || socket.destroyed) {
                reject(new ReceiverError({
                    message: `Receiver ${this.host} is not connected`,
                    domain: 'transport',
                    code: 'NOT_CONNECTED',
                }));
                return;
            }
            socket.write(frame, (err) => {
                if (!err) {
                    resolve();
                    return;
                }
                const lost = wrapSocketError(err, 'Write failed');
                this.log.warn({err: lost.message}, 'Write failed, dropping connection');
                socket.destroy(lost);
                reject(lost);
            });
        });
    }

    private connectInternal(): Promise<void> {
        if (this.socket) {
            this.log.warn('Discarding stale socket before reconnecting');
            const stale = this.socket;
            this.socket = null;
            stale.destroy();
        }

        this.setState('connecting');
        const socket = net.createConnection({
            host: this.options.host,
            port: RECEIVER_PORT,
            localAddress: this.options.localAddress,
        });
        this.socket = socket;
        this.streamBuffer = Buffer.alloc(0);

        return new Promise<void>((resolve, reject) => {
            let settled = false;
            let lastError: ReceiverError | null = null;
            const connectTimer = setTimeout(() => {
                socket.destroy(new ReceiverError({
                    message: `Connect to ${this.host}:${RECEIVER_PORT} timed out after ${this.connectTimeoutMs}ms`,
                    domain: 'transport',
                    code: 'CONNECTION_LOST',
                }));
            }, this.connectTimeoutMs);

            const settle = (error: ReceiverError | null): void => {
                if (settled) return;
                settled = true;
                clearTimeout(connectTimer);
                if (error) reject(error);
                else resolve();
            };

            socket.once('connect', () => {
                if (this.socket !== socket) {
                    settle(new ReceiverError({
                        message: 'Connect attempt was superseded',
                        domain: 'transport',
                        code: 'CONNECTION_CLOSED',
                    }));
                    return;
                }
                this.onConnected();
                settle(null);
            });
            socket.on('data', (chunk: Buffer) => this.onData(socket, chunk));
            socket.on('end', () => {
                if (this.socket !== socket) return;
                this.log.info('Receiver closed the connection');
                socket.destroy();
            });
            socket.on('error', (err) => {
                lastError = wrapSocketError(err, 'Socket error');
                if (this.socket === socket) {
                    this.log.debug({err: lastError.message}, 'Socket error');
                }
            });
            socket.on('close', () => {
                const error = lastError ?? new ReceiverError({
                    message: 'Receiver closed the connection',
                    domain: 'transport',
                    code: 'CONNECTION_LOST',
                });
                settle(error);
                this.onClose(socket, error);
            });
        });
    }

    private onConnected(): void {
        this.reconnectAttempts = 0;
        this.stopReconnectTimer();
        this.lastActivityAt = Date.now();
        this.setState('connected');
        this.startHeartbeat();
        this.resetIdleTimer();
        this.log.info({port: RECEIVER_PORT}, 'Connected');
        this.emit('connect');
    }

    private onData(socket: Socket, chunk: Buffer): void {
        if (this.socket !== socket) return;
        this.streamBuffer = Buffer.concat([this.streamBuffer, chunk]);
        const {frames, invalid, remainder} = extractStatusFrames(this.streamBuffer);
        this.streamBuffer = remainder;

        for (const reason of invalid) {
            this.log.debug({reason}, 'Skipped invalid frame bytes');
            this.emit('invalidFrame', new ReceiverError({
                message: reason,
                domain: 'codec',
                code: 'FRAME_INVALID',
            }));
        }
        for (const frame of frames) {
            if (this.socket !== socket) return;
            this.lastActivityAt = Date.now();
            this.resetIdleTimer();
            try {
                this.emit('frame', frame);
            } catch (err) {
                this.log.error({err, command: frame.command}, 'Frame handler threw');
            }
        }

        if (this.streamBuffer.length > this.maxBufferBytes) {
            this.log.warn({bytes: this.streamBuffer.length}, 'Stream buffer overflow, dropping buffered bytes');
            this.streamBuffer = Buffer.alloc(0);
        }
    }

    private onClose(socket: Socket, reason: ReceiverError): void {
        if (this.socket !== socket) return;
        const wasConnected = this.state === 'connected';
        this.socket = null;
        this.streamBuffer = Buffer.alloc(0);
        this.stopHeartbeat();
        this.stopIdleTimer();
        this.setState('disconnected');

        if (wasConnected) {
            this.log.warn({reason: reason.message}, 'Connection lost');
            this.emit('disconnect', reason);
        } else {
            this.log.debug({reason: reason.message}, 'Connect attempt failed');
            this.emit('connectFailed', reason);
        }
        if (!this.manualClose && this.autoReconnect) {
            this.scheduleReconnect();
        }
    }

    private scheduleReconnect(): void {
        if (this.reconnectTimer) return;
        this.reconnectAttempts += 1;
        const delayMs = computeReconnectDelay(this.reconnectAttempts, this.backoff, this.random);
        this.log.info({attempt: this.reconnectAttempts, delayMs}, 'Scheduling reconnect');
        this.emit('reconnecting', this.reconnectAttempts, delayMs);
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            this.connect().catch((err) => {
                this.log.debug({err: err instanceof Error ? err.message : String(err)}, 'Reconnect attempt failed');
            });
        }, delayMs);
    }

    private stopReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    private startHeartbeat(): void {
        this.stopHeartbeat();
        if (this.heartbeatIntervalMs <= 0) return;
        const heartbeat = encodeCommand(Command.Heartbeat);
        this.heartbeatTimer = setInterval(() => {
            if (!this.isConnected()) return;
            this.send(heartbeat).then(() => {
                this.emit('heartbeat');
            }).catch((err) => {
                this.log.debug({err: err instanceof Error ? err.message : String(err)}, 'Heartbeat write failed');
            });
        }, this.heartbeatIntervalMs);
    }

    private stopHeartbeat(): void {
        if (this.heartbeatTimer) {
            clearInterval(this.heartbeatTimer);
            this.heartbeatTimer = null;
        }
    }

    private resetIdleTimer(): void {
        this.stopIdleTimer();
        if (this.idleTimeoutMs <= 0) return;
        this.idleTimer = setTimeout(() => {
            this.idleTimer = null;
            const socket = this.socket;
            if (!socket) return;
            this.log.warn({idleTimeoutMs: this.idleTimeoutMs}, 'No frame received in time, forcing reconnect');
            socket.destroy(new ReceiverError({
                message: `No frame received for ${this.idleTimeoutMs}ms`,
                domain: 'transport',
                code: 'CONNECTION_LOST',
            }));
        }, this.idleTimeoutMs);
    }

    private stopIdleTimer(): void {
        if (this.idleTimer) {
            clearTimeout(this.idleTimer);
            this.idleTimer = null;
        }
    }

    private setState(next: ConnectionState): void {
        if (next === this.state) return;
        this.state = next;
        this.emit('state', next);
    }
}
