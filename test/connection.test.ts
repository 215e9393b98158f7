import {EventEmitter} from 'events';
import {createConnection} from 'net';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

class MockSocket extends EventEmitter {
    public writes: Buffer[] = [];
    public destroyed = false;
    public failWrites = false;

    public write(chunk: Buffer | Uint8Array, cb?: (err?: Error | null) => void): boolean {
        if (this.failWrites) {
            cb?.(Object.assign(new Error('write EPIPE'), {code: 'EPIPE'}));
            return false;
        }
        this.writes.push(Buffer.from(chunk));
        cb?.(null);
        return true;
    }

    public destroy(error?: Error): this {
        this.destroyed = true;
        if (error) this.emit('error', error);
        this.emit('close', !!error);
        return this;
    }
}

const sockets: MockSocket[] = [];

vi.mock('net', () => ({
    createConnection: vi.fn(() => {
        const socket = new MockSocket();
        sockets.push(socket);
        return socket;
    }),
}));

import {
    Command,
    computeReconnectDelay,
    encodeStatusFrame,
    ReceiverConnection,
    ReceiverError,
    silentLogger,
    type ReceiverConnectionOptions,
} from '../src';

const socketAt = (index: number): MockSocket => {
    const socket = sockets[index];
    if (!socket) throw new Error(`no socket #${index}`);
    return socket;
};

const createReceiverConnection = (options: Partial<ReceiverConnectionOptions> = {}): ReceiverConnection =>
    new ReceiverConnection({
        host: '127.0.0.1',
        autoReconnect: false,
        heartbeatIntervalMs: 0,
        idleTimeoutMs: 0,
        reconnectJitter: 0,
        logger: silentLogger(),
        ...options,
    });

const open = async (connection: ReceiverConnection): Promise<MockSocket> => {
    const pending = connection.connect();
    const socket = socketAt(sockets.length - 1);
    socket.emit('connect');
    await pending;
    return socket;
};

const volumeFrame = encodeStatusFrame({command: Command.Volume, data: [40]});
const muteFrame = encodeStatusFrame({command: Command.Mute, data: [1]});

beforeEach(() => {
    sockets.length = 0;
    vi.mocked(createConnection).mockClear();
});

afterEach(() => {
    vi.useRealTimers();
});

describe('computeReconnectDelay', () => {
    const backoff = {baseMs: 1000, maxMs: 30000, jitter: 0.2};

    it('doubles from the base delay and caps at the maximum', () => {
        const delays = [1, 2, 3, 4, 5, 6, 7].map((attempt) => computeReconnectDelay(attempt, backoff, () => 0));
        expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
    });

    it('adds multiplicative jitter without exceeding the cap', () => {
        expect(computeReconnectDelay(1, backoff, () => 1)).toBe(1200);
        expect(computeReconnectDelay(5, backoff, () => 1)).toBe(19200);
        expect(computeReconnectDelay(6, backoff, () => 1)).toBe(30000);
    });

    it('never decreases as attempts grow', () => {
        const delays = Array.from({length: 12}, (_, i) => computeReconnectDelay(i + 1, backoff, () => 0.5));
        for (let i = 1; i < delays.length; i++) {
            expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0);
        }
    });
});

describe('ReceiverConnection', () => {
    it('connects to the fixed control port', async () => {
        const connection = createReceiverConnection();
        const states: string[] = [];
        connection.on('state', (state) => states.push(state));

        await open(connection);

        expect(createConnection).toHaveBeenCalledWith(expect.objectContaining({host: '127.0.0.1', port: 50000}));
        expect(connection.isConnected()).toBe(true);
        expect(connection.getLastActivity()).not.toBeNull();
        expect(states).toEqual(['connecting', 'connected']);
    });

    it('shares one attempt between concurrent connect calls', async () => {
        const connection = createReceiverConnection();
        const first = connection.connect();
        const second = connection.connect();
        expect(sockets).toHaveLength(1);

        socketAt(0).emit('connect');
        await Promise.all([first, second]);
        expect(connection.getState()).toBe('connected');
    });

    it('emits frames in wire order across chunk boundaries', async () => {
        const connection = createReceiverConnection();
        const socket = await open(connection);
        const commands: number[] = [];
        connection.on('frame', (frame) => commands.push(frame.command));

        socket.emit('data', Buffer.concat([volumeFrame, muteFrame.subarray(0, 3)]));
        expect(commands).toEqual([Command.Volume]);
        socket.emit('data', muteFrame.subarray(3));
        expect(commands).toEqual([Command.Volume, Command.Mute]);
    });

    it('skips corrupt bytes and reports them', async () => {
        const connection = createReceiverConnection();
        const socket = await open(connection);
        const errors: ReceiverError[] = [];
        const commands: number[] = [];
        connection.on('invalidFrame', (error) => errors.push(error));
        connection.on('frame', (frame) => commands.push(frame.command));

        socket.emit('data', Buffer.concat([Buffer.from([0xaa, 0xbb]), volumeFrame]));

        expect(errors).toHaveLength(1);
        expect(errors[0]).toMatchObject({code: 'FRAME_INVALID', message: 'Unexpected byte 0xaa before start marker'});
        expect(commands).toEqual([Command.Volume]);
    });

    it('drops the stream buffer when it grows past the limit', async () => {
        const connection = createReceiverConnection({maxBufferBytes: 8});
        const socket = await open(connection);
        const commands: number[] = [];
        connection.on('frame', (frame) => commands.push(frame.command));
        const large = encodeStatusFrame({command: Command.Version, data: new Array<number>(40).fill(1)});

        socket.emit('data', large.subarray(0, 10));
        socket.emit('data', large.subarray(10));
        socket.emit('data', muteFrame);

        expect(commands).toEqual([Command.Mute]);
    });

    it('serializes writes and numbers them', async () => {
        const connection = createReceiverConnection();
        const socket = await open(connection);
        const first = Buffer.from([0x23, 0x06, 0x01, 0x0a, 0x0d]);
        const second = Buffer.from([0x23, 0x07, 0x01, 0x01, 0x0d]);

        const sequences = await Promise.all([connection.send(first), connection.send(second)]);

        expect(sequences).toEqual([1, 2]);
        expect(socket.writes).toEqual([first, second]);
        expect(connection.getSequence()).toBe(2);
    });

    it('rejects sends outside a session', async () => {
        const connection = createReceiverConnection();
        await expect(connection.send(Buffer.from([0x23, 0x51, 0x00, 0x0d]))).rejects.toMatchObject({code: 'NOT_CONNECTED'});
    });

    it('drops the connection when a write fails', async () => {
        const connection = createReceiverConnection();
        const socket = await open(connection);
        const reasons: ReceiverError[] = [];
        connection.on('disconnect', (reason) => reasons.push(reason));
        socket.failWrites = true;

        await expect(connection.send(Buffer.from([0x23, 0x51, 0x00, 0x0d]))).rejects.toMatchObject({
            code: 'CONNECTION_LOST',
            details: {errno: 'EPIPE'},
        });
        expect(socket.destroyed).toBe(true);
        expect(connection.getState()).toBe('disconnected');
        expect(reasons.map((reason) => reason.code)).toEqual(['CONNECTION_LOST']);
    });

    it('treats a peer end as a lost connection', async () => {
        const connection = createReceiverConnection();
        const socket = await open(connection);
        const reasons: ReceiverError[] = [];
        connection.on('disconnect', (reason) => reasons.push(reason));

        socket.emit('end');

        expect(socket.destroyed).toBe(true);
        expect(reasons).toHaveLength(1);
        expect(reasons[0]).toMatchObject({code: 'CONNECTION_LOST', message: 'Receiver closed the connection'});
    });

    it('reconnects with growing delays after failures', async () => {
        vi.useFakeTimers();
        const connection = createReceiverConnection({autoReconnect: true, reconnectDelayMs: 100, reconnectMaxDelayMs: 1000});
        const attempts: Array<[number, number]> = [];
        const failures: ReceiverError[] = [];
        connection.on('reconnecting', (attempt, delayMs) => attempts.push([attempt, delayMs]));
        connection.on('connectFailed', (error) => failures.push(error));

        const socket = await open(connection);
        socket.emit('close', false);
        expect(attempts).toEqual([[1, 100]]);

        await vi.advanceTimersByTimeAsync(99);
        expect(sockets).toHaveLength(1);
        await vi.advanceTimersByTimeAsync(1);
        expect(sockets).toHaveLength(2);

        socketAt(1).destroy(Object.assign(new Error('connect ECONNREFUSED'), {code: 'ECONNREFUSED'}));
        await vi.advanceTimersByTimeAsync(0);
        expect(failures).toHaveLength(1);
        expect(failures[0]?.details).toEqual({errno: 'ECONNREFUSED'});
        expect(attempts).toEqual([[1, 100], [2, 200]]);

        await vi.advanceTimersByTimeAsync(200);
        expect(sockets).toHaveLength(3);
        socketAt(2).emit('connect');
        await vi.advanceTimersByTimeAsync(0);
        expect(connection.isConnected()).toBe(true);

        socketAt(2).emit('close', false);
        expect(attempts.at(-1)).toEqual([1, 100]);
        connection.shutdown();
    });

    it('ignores a socket it has replaced', async () => {
        vi.useFakeTimers();
        const connection = createReceiverConnection({autoReconnect: true, reconnectDelayMs: 100});
        const stale = await open(connection);
        stale.emit('close', false);
        await vi.advanceTimersByTimeAsync(100);
        socketAt(1).emit('connect');
        await vi.advanceTimersByTimeAsync(0);

        let frames = 0;
        let disconnects = 0;
        connection.on('frame', () => {
            frames += 1;
        });
        connection.on('disconnect', () => {
            disconnects += 1;
        });
        stale.emit('data', volumeFrame);
        stale.emit('close', false);

        expect(frames).toBe(0);
        expect(disconnects).toBe(0);
        expect(connection.isConnected()).toBe(true);
        connection.shutdown();
    });

    it('fails an attempt that does not complete in time', async () => {
        vi.useFakeTimers();
        const connection = createReceiverConnection({connectTimeoutMs: 500});
        const failures: ReceiverError[] = [];
        connection.on('connectFailed', (error) => failures.push(error));

        const outcome = expect(connection.connect()).rejects.toMatchObject({code: 'CONNECTION_LOST'});
        await vi.advanceTimersByTimeAsync(500);
        await outcome;

        expect(socketAt(0).destroyed).toBe(true);
        expect(failures).toHaveLength(1);
        expect(failures[0]?.details).toBeUndefined();
    });

    it('forces a reconnect when the receiver goes quiet', async () => {
        vi.useFakeTimers();
        const connection = createReceiverConnection({idleTimeoutMs: 1000});
        const socket = await open(connection);
        const reasons: ReceiverError[] = [];
        connection.on('disconnect', (reason) => reasons.push(reason));

        await vi.advanceTimersByTimeAsync(999);
        socket.emit('data', volumeFrame);
        await vi.advanceTimersByTimeAsync(999);
        expect(connection.isConnected()).toBe(true);

        await vi.advanceTimersByTimeAsync(1);
        expect(connection.isConnected()).toBe(false);
        expect(reasons[0]).toMatchObject({code: 'CONNECTION_LOST', message: 'No frame received for 1000ms'});
    });

    it('sends heartbeats while connected', async () => {
        vi.useFakeTimers();
        const connection = createReceiverConnection({heartbeatIntervalMs: 500});
        const socket = await open(connection);
        const beat = new Promise<void>((resolve) => connection.once('heartbeat', () => resolve()));

        await vi.advanceTimersByTimeAsync(500);
        await beat;

        expect(socket.writes.map((write) => Array.from(write))).toEqual([[0x23, 0x51, 0x00, 0x0d]]);
        connection.shutdown();
    });

    it('stays down after shutdown', async () => {
        vi.useFakeTimers();
        const connection = createReceiverConnection({autoReconnect: true, heartbeatIntervalMs: 500});
        const socket = await open(connection);
        const reasons: ReceiverError[] = [];
        connection.on('disconnect', (reason) => reasons.push(reason));

        connection.shutdown();
        await vi.advanceTimersByTimeAsync(60000);

        expect(socket.destroyed).toBe(true);
        expect(socket.writes).toHaveLength(0);
        expect(sockets).toHaveLength(1);
        expect(connection.getState()).toBe('disconnected');
        expect(reasons.map((reason) => reason.code)).toEqual(['CONNECTION_CLOSED']);
        await expect(connection.send(Buffer.from([0x23, 0x51, 0x00, 0x0d]))).rejects.toMatchObject({code: 'NOT_CONNECTED'});
    });
});
