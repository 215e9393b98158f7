/**
 * Control axes: how an intent becomes an operand, and how status frames become state.
 * @module protocol/commands
 */
import {
    Command,
    EQ_MAX_DB,
    EQ_MIN_DB,
    InputSource,
    IrKey,
    ReceiverModel,
    REQUEST_DATA,
    SurroundMode,
    VOLUME_MAX,
    VOLUME_MIN,
} from './constants';
import {hasExtendedFeatures, supportsInput, supportsSurroundMode} from './capabilities';
import {ReceiverError} from './errors';
import {encodeCommand, type StatusFrame} from './frame';
import type {ReceiverFields} from '../core/types';

/** Value type accepted by each control axis. */
export type AxisValueMap = {
    power: boolean;
    volume: number;
    mute: boolean;
    input: InputSource;
    surroundMode: SurroundMode;
    displayDim: number;
    partyMode: boolean;
    partyVolume: number;
    trebleEq: number;
    bassEq: number;
    roomEq: boolean;
    dialogEnhanced: boolean;
    dolbyAudioMode: boolean;
    drc: boolean;
};

export type Axis = keyof AxisValueMap;

export type AxisCodec<T> = {
    command: Command;
    /** Validated operand bytes. Throws `ENCODING_ERROR` for values the protocol cannot carry. */
    operand(value: T): number[];
    /** State the receiver should report once the command took effect. */
    expected(value: T): Partial<ReceiverFields>;
    /** Model gate; absent means every model. */
    supported?(value: T, model: ReceiverModel): boolean;
};

type AxisCodecMap = {[A in Axis]: AxisCodec<AxisValueMap[A]>};

const encodingError = (message: string, details?: Record<string, unknown>): ReceiverError =>
    new ReceiverError({message, domain: 'codec', code: 'ENCODING_ERROR', details});

const integerIn = (value: number, min: number, max: number, what: string): number => {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw encodingError(`${what} must be an integer ${min}-${max}, got ${value}`, {value});
    }
    return value;
};

export const isInputSource = (value: number): value is InputSource =>
    Object.values(InputSource).some((entry) => entry === value);

export const isSurroundMode = (value: number): value is SurroundMode =>
    Object.values(SurroundMode).some((entry) => entry === value);

export const isModel = (value: number): value is ReceiverModel =>
    Object.values(ReceiverModel).some((entry) => entry === value);

const toggle = (command: Command, expected: (on: boolean) => Partial<ReceiverFields>): AxisCodec<boolean> => ({
    command,
    operand: (on) => [on ? 0x01 : 0x00],
    expected,
});

const AXES: AxisCodecMap = {
    power: {
        command: Command.Power,
        operand: (on) => [on ? 0x01 : 0x00],
        expected: (on) => ({power: on ? 'on' : 'standby'}),
    },
    volume: {
        command: Command.Volume,
        operand: (level) => [integerIn(level, VOLUME_MIN, VOLUME_MAX, 'Volume')],
        expected: (level) => ({volume: level}),
    },
    mute: toggle(Command.Mute, (muted) => ({muted})),
    input: {
        command: Command.InputSource,
        operand: (input) => {
            if (!isInputSource(input)) throw encodingError(`Unknown input source ${input}`, {input});
            return [input];
        },
        expected: (input) => ({input}),
        supported: (input, model) => supportsInput(model, input),
    },
    surroundMode: {
        command: Command.SurroundMode,
        operand: (mode) => {
            if (!isSurroundMode(mode)) throw encodingError(`Unknown surround mode ${mode}`, {mode});
            return [mode];
        },
        expected: (surroundMode) => ({surroundMode}),
        supported: (mode, model) => supportsSurroundMode(model, mode),
    },
    displayDim: {
        command: Command.DisplayDim,
        operand: (level) => [integerIn(level, 0, 3, 'Display brightness')],
        expected: (displayDim) => ({displayDim}),
    },
    partyMode: {
        ...toggle(Command.PartyMode, (partyMode) => ({partyMode})),
        supported: (_on, model) => hasExtendedFeatures(model),
    },
    partyVolume: {
        command: Command.PartyVolume,
        operand: (level) => [integerIn(level, VOLUME_MIN, VOLUME_MAX, 'Party volume')],
        expected: (partyVolume) => ({partyVolume}),
        supported: (_level, model) => hasExtendedFeatures(model),
    },
    trebleEq: {
        command: Command.TrebleEq,
        operand: (db) => [integerIn(db, EQ_MIN_DB, EQ_MAX_DB, 'Treble') - EQ_MIN_DB],
        expected: (trebleEq) => ({trebleEq}),
    },
    bassEq: {
        command: Command.BassEq,
        operand: (db) => [integerIn(db, EQ_MIN_DB, EQ_MAX_DB, 'Bass') - EQ_MIN_DB],
        expected: (bassEq) => ({bassEq}),
    },
    roomEq: toggle(Command.RoomEq, (roomEq) => ({roomEq})),
    dialogEnhanced: toggle(Command.DialogEnhanced, (dialogEnhanced) => ({dialogEnhanced})),
    dolbyAudioMode: toggle(Command.DolbyAudioMode, (dolbyAudioMode) => ({dolbyAudioMode})),
    drc: {
        ...toggle(Command.Drc, (drc) => ({drc})),
        supported: (_on, model) => hasExtendedFeatures(model),
    },
};

export const AXIS_NAMES: readonly Axis[] = [
    'power',
    'volume',
    'mute',
    'input',
    'surroundMode',
    'displayDim',
    'partyMode',
    'partyVolume',
    'trebleEq',
    'bassEq',
    'roomEq',
    'dialogEnhanced',
    'dolbyAudioMode',
    'drc',
];

export const axisCodec = <A extends Axis>(axis: A): AxisCodecMap[A] => AXES[axis];

/** Returns the axis driven by `command`, if any. */
export const axisForCommand = (command: number): Axis | undefined =>
    AXIS_NAMES.find((axis) => AXES[axis].command === command);

/**
 * Validate `value` for `axis` (and `model`, when known) and encode the command frame.
 */
export const encodeIntent = <A extends Axis>(axis: A, value: AxisValueMap[A], model: ReceiverModel | null = null): Buffer => {
    const codec = axisCodec(axis);
    const operand = codec.operand(value);
    if (model !== null && codec.supported && !codec.supported(value, model)) {
        throw encodingError(`Axis "${axis}" value ${String(value)} is not supported by model 0x${model.toString(16)}`, {
            axis,
            model,
        });
    }
    return encodeCommand(codec.command, operand);
};

/**
 * Build a simulated IR key press. Key presses are not state, so they bypass
 * the axis machinery and are never coalesced or retried.
 */
export const encodeIrKey = (code: IrKey | number): Buffer => {
    const value = integerIn(code, 0, 0xffffff, 'IR code');
    return encodeCommand(Command.SimulateIr, [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff]);
};

/** Build a `0xF0` query for `command`. */
export const encodeQuery = (command: Command): Buffer => encodeCommand(command, [REQUEST_DATA]);

const firstByte = (frame: StatusFrame): number | null => (frame.data.length > 0 ? frame.data.readUInt8(0) : null);

const flag = (byte: number | null): boolean | null => (byte === null ? null : byte !== 0);

/**
 * Map a status frame onto state fields.
 * Returns `null` for command codes this library does not know.
 * Known commands without a state field, or with an unusable operand, yield `{}`.
 */
export const parseStatus = (frame: StatusFrame): Partial<ReceiverFields> | null => {
    const byte = firstByte(frame);
    switch (frame.command) {
        case Command.Power:
            if (byte === 0x01) return {power: 'on'};
            if (byte === 0x00) return {power: 'standby'};
            return {};
        case Command.Volume:
            return byte !== null && byte <= VOLUME_MAX ? {volume: byte} : {};
        case Command.Mute:
            return byte === null ? {} : {muted: flag(byte)};
        case Command.InputSource:
            return byte !== null && isInputSource(byte) ? {input: byte} : {};
        case Command.SurroundMode:
            return byte !== null && isSurroundMode(byte) ? {surroundMode: byte} : {};
        case Command.Initialization:
            return byte !== null && isModel(byte) ? {model: byte} : {};
        case Command.DisplayDim:
            return byte !== null && byte <= 3 ? {displayDim: byte} : {};
        case Command.PartyMode:
            return byte === null ? {} : {partyMode: flag(byte)};
        case Command.PartyVolume:
            return byte !== null && byte <= VOLUME_MAX ? {partyVolume: byte} : {};
        case Command.TrebleEq:
            return byte !== null && byte <= EQ_MAX_DB - EQ_MIN_DB ? {trebleEq: byte + EQ_MIN_DB} : {};
        case Command.BassEq:
            return byte !== null && byte <= EQ_MAX_DB - EQ_MIN_DB ? {bassEq: byte + EQ_MIN_DB} : {};
        case Command.RoomEq:
            return byte === null ? {} : {roomEq: flag(byte)};
        case Command.DialogEnhanced:
            return byte === null ? {} : {dialogEnhanced: flag(byte)};
        case Command.DolbyAudioMode:
            return byte === null ? {} : {dolbyAudioMode: flag(byte)};
        case Command.Drc:
            return byte === null ? {} : {drc: flag(byte)};
        case Command.StreamingState:
            return byte === null ? {} : {streamingState: byte};
        case Command.Version:
        case Command.SimulateIr:
        case Command.Heartbeat:
        case Command.Reboot:
        case Command.FactoryReset:
            return {};
        default:
            return null;
    }
};
