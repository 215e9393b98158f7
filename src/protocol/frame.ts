/**
 * Frame codec for the MA-series binary control dialect.
 * @module protocol/frame
 *
 * Controller -> receiver: `0x23 <cmd> <len> <data...> 0x0D`
 * Receiver -> controller: `0x02 0x23 <cmd> <rsp> <len> <data...> 0x0D`
 *
 * The dialect has no arithmetic checksum; a frame is valid when its start
 * marker, declared length and terminator all line up.
 */
import {
    Command,
    COMMAND_START,
    FRAME_END,
    MAX_FRAME_DATA_LENGTH,
    RESPONSE_START,
    ResponseCode,
} from './constants';
import {ReceiverError} from './errors';

/** Frame written by the controller. */
export type CommandFrame = {
    command: number;
    data: Buffer;
};

/** Frame written by the receiver (status update or error response). */
export type StatusFrame = {
    command: number;
    responseCode: number;
    data: Buffer;
    raw: Buffer;
};

export type StatusFrameOptions = {
    command: number;
    responseCode?: number;
    data?: ArrayLike<number>;
};

/**
 * Outcome of decoding the head of an accumulating buffer.
 * `bytesConsumed` on `invalid` is the offset of the next candidate start marker.
 */
export type DecodeResult<F> =
    | {kind: 'frame'; frame: F; bytesConsumed: number}
    | {kind: 'needMoreData'; bytesConsumed: 0}
    | {kind: 'invalid'; reason: string; bytesConsumed: number};

const RESPONSE_HEADER_LENGTH = 5;
const COMMAND_HEADER_LENGTH = 3;

/** Maximum operand length accepted per command. */
const OPERAND_LIMITS = new Map<number, number>([
    [Command.Power, 1],
    [Command.DisplayDim, 1],
    [Command.Version, 1],
    [Command.SimulateIr, 3],
    [Command.InputSource, 1],
    [Command.Volume, 1],
    [Command.Mute, 1],
    [Command.SurroundMode, 1],
    [Command.PartyMode, 1],
    [Command.PartyVolume, 1],
    [Command.TrebleEq, 1],
    [Command.BassEq, 1],
    [Command.RoomEq, 1],
    [Command.DialogEnhanced, 1],
    [Command.DolbyAudioMode, 1],
    [Command.Drc, 1],
    [Command.StreamingState, 1],
    [Command.Initialization, 1],
    [Command.Heartbeat, 0],
    [Command.Reboot, 0],
    [Command.FactoryReset, 0],
]);

const NEED_MORE_DATA = {kind: 'needMoreData', bytesConsumed: 0} as const;

const hex = (value: number): string => `0x${value.toString(16).padStart(2, '0')}`;

const toBytes = (values: ArrayLike<number>, what: string): Buffer => {
    const bytes = Buffer.alloc(values.length);
    for (let i = 0; i < values.length; i++) {
        const value = values[i];
        if (value === undefined || !Number.isInteger(value) || value < 0 || value > 0xff) {
            throw new ReceiverError({
                message: `${what} byte ${i} must be an integer 0-255, got ${String(value)}`,
                domain: 'codec',
                code: 'ENCODING_ERROR',
            });
        }
        bytes.writeUInt8(value, i);
    }
    return bytes;
};

/** Returns the operand length limit for `command`, or `undefined` for unknown commands. */
export const operandLimit = (command: number): number | undefined => OPERAND_LIMITS.get(command);

/**
 * Build a controller -> receiver command frame.
 * Throws `ReceiverError(code=ENCODING_ERROR)` for unknown commands or oversized operands.
 */
export const encodeCommand = (command: Command | number, operand: ArrayLike<number> = []): Buffer => {
    const limit = OPERAND_LIMITS.get(command);
    if (limit === undefined) {
        throw new ReceiverError({
            message: `Unknown command ${hex(command)}`,
            domain: 'codec',
            code: 'ENCODING_ERROR',
            details: {command},
        });
    }
    if (operand.length > limit) {
        throw new ReceiverError({
            message: `Command ${hex(command)} takes at most ${limit} operand byte(s), got ${operand.length}`,
            domain: 'codec',
            code: 'ENCODING_ERROR',
            details: {command, length: operand.length},
        });
    }
    const data = toBytes(operand, 'Operand');
    const buffer = Buffer.alloc(COMMAND_HEADER_LENGTH + data.length + 1);
    buffer.writeUInt8(COMMAND_START, 0);
    buffer.writeUInt8(command, 1);
    buffer.writeUInt8(data.length, 2);
    data.copy(buffer, COMMAND_HEADER_LENGTH);
    buffer.writeUInt8(FRAME_END, buffer.length - 1);
    return buffer;
};

/**
 * Build a receiver -> controller frame. Used by in-process receiver stand-ins.
 */
export const encodeStatusFrame = ({command, responseCode = ResponseCode.StatusUpdate, data = []}: StatusFrameOptions): Buffer => {
    if (data.length > MAX_FRAME_DATA_LENGTH) {
        throw new ReceiverError({
            message: `Status data must be at most ${MAX_FRAME_DATA_LENGTH} bytes, got ${data.length}`,
            domain: 'codec',
            code: 'ENCODING_ERROR',
        });
    }
    const payload = toBytes(data, 'Status data');
    const header = toBytes([command, responseCode], 'Status header');
    const buffer = Buffer.alloc(RESPONSE_HEADER_LENGTH + payload.length + 1);
    RESPONSE_START.copy(buffer, 0);
    header.copy(buffer, 2);
    buffer.writeUInt8(payload.length, 4);
    payload.copy(buffer, RESPONSE_HEADER_LENGTH);
    buffer.writeUInt8(FRAME_END, buffer.length - 1);
    return buffer;
};

const resyncOffset = (buffer: Buffer, marker: number): number => {
    const next = buffer.indexOf(marker, 1);
    return next === -1 ? buffer.length : next;
};

const invalid = (reason: string, bytesConsumed: number): DecodeResult<never> => ({
    kind: 'invalid',
    reason,
    bytesConsumed,
});

/**
 * Decode one receiver -> controller frame from the head of `buffer`.
 */
export const decodeStatusFrame = (buffer: Buffer): DecodeResult<StatusFrame> => {
    const marker = RESPONSE_START.readUInt8(0);
    if (buffer.length === 0) return NEED_MORE_DATA;
    if (buffer.readUInt8(0) !== marker) {
        return invalid(`Unexpected byte ${hex(buffer.readUInt8(0))} before start marker`, resyncOffset(buffer, marker));
    }
    if (buffer.length < 2) return NEED_MORE_DATA;
    if (buffer.readUInt8(1) !== RESPONSE_START.readUInt8(1)) {
        return invalid(`Broken start marker ${hex(buffer.readUInt8(1))}`, resyncOffset(buffer, marker));
    }
    if (buffer.length < RESPONSE_HEADER_LENGTH) return NEED_MORE_DATA;

    const dataLength = buffer.readUInt8(4);
    if (dataLength > MAX_FRAME_DATA_LENGTH) {
        return invalid(`Declared length ${dataLength} exceeds ${MAX_FRAME_DATA_LENGTH}`, resyncOffset(buffer, marker));
    }
    const totalLength = RESPONSE_HEADER_LENGTH + dataLength + 1;
    if (buffer.length < totalLength) return NEED_MORE_DATA;
    if (buffer.readUInt8(totalLength - 1) !== FRAME_END) {
        return invalid(`Missing terminator at offset ${totalLength - 1}`, resyncOffset(buffer, marker));
    }

    return {
        kind: 'frame',
        frame: {
            command: buffer.readUInt8(2),
            responseCode: buffer.readUInt8(3),
            data: Buffer.from(buffer.subarray(RESPONSE_HEADER_LENGTH, RESPONSE_HEADER_LENGTH + dataLength)),
            raw: Buffer.from(buffer.subarray(0, totalLength)),
        },
        bytesConsumed: totalLength,
    };
};

/**
 * Decode one controller -> receiver frame from the head of `buffer`.
 */
export const decodeCommandFrame = (buffer: Buffer): DecodeResult<CommandFrame> => {
    if (buffer.length === 0) return NEED_MORE_DATA;
    if (buffer.readUInt8(0) !== COMMAND_START) {
        return invalid(`Unexpected byte ${hex(buffer.readUInt8(0))} before start marker`, resyncOffset(buffer, COMMAND_START));
    }
    if (buffer.length < COMMAND_HEADER_LENGTH) return NEED_MORE_DATA;

    const dataLength = buffer.readUInt8(2);
    if (dataLength > MAX_FRAME_DATA_LENGTH) {
        return invalid(`Declared length ${dataLength} exceeds ${MAX_FRAME_DATA_LENGTH}`, resyncOffset(buffer, COMMAND_START));
    }
    const totalLength = COMMAND_HEADER_LENGTH + dataLength + 1;
    if (buffer.length < totalLength) return NEED_MORE_DATA;
    if (buffer.readUInt8(totalLength - 1) !== FRAME_END) {
        return invalid(`Missing terminator at offset ${totalLength - 1}`, resyncOffset(buffer, COMMAND_START));
    }

    return {
        kind: 'frame',
        frame: {
            command: buffer.readUInt8(1),
            data: Buffer.from(buffer.subarray(COMMAND_HEADER_LENGTH, COMMAND_HEADER_LENGTH + dataLength)),
        },
        bytesConsumed: totalLength,
    };
};

/**
 * Drain every complete frame from an accumulating stream buffer.
 * Invalid spans are skipped; incomplete trailing bytes are returned as `remainder`.
 */
export const extractFrames = <F>(
    streamBuffer: Buffer,
    decode: (buffer: Buffer) => DecodeResult<F>,
): {frames: F[]; invalid: string[]; remainder: Buffer} => {
    const frames: F[] = [];
    const invalidReasons: string[] = [];
    let offset = 0;

    while (offset < streamBuffer.length) {
        const result = decode(streamBuffer.subarray(offset));
        if (result.kind === 'needMoreData') break;
        if (result.kind === 'invalid') {
            invalidReasons.push(result.reason);
        } else {
            frames.push(result.frame);
        }
        offset += result.bytesConsumed;
    }

    return {
        frames,
        invalid: invalidReasons,
        remainder: Buffer.from(streamBuffer.subarray(offset)),
    };
};

/** {@link extractFrames} for the receiver -> controller direction. */
export const extractStatusFrames = (streamBuffer: Buffer): {frames: StatusFrame[]; invalid: string[]; remainder: Buffer} =>
    extractFrames(streamBuffer, decodeStatusFrame);

/** Returns `true` when the frame reports an error instead of a value. */
export const isErrorResponse = (frame: StatusFrame): boolean =>
    frame.responseCode !== ResponseCode.StatusUpdate;
