/**
 * Receiver state model shared by the synchronizer, dispatcher and controller.
 * @module core/types
 */
import type {InputSource, ReceiverModel, SurroundMode} from '../protocol/constants';

/** `green-standby` is inferred, the receiver never reports it. */
export type PowerState = 'on' | 'standby' | 'green-standby';

/**
 * Device-reported attributes. `null` means unknown.
 */
export type ReceiverFields = {
    power: PowerState | null;
    /** Master volume, 0-99. */
    volume: number | null;
    muted: boolean | null;
    input: InputSource | null;
    surroundMode: SurroundMode | null;
    model: ReceiverModel | null;
    /** Front panel brightness: 0 off, 1 dim, 2 mid, 3 bright. */
    displayDim: number | null;
    partyMode: boolean | null;
    partyVolume: number | null;
    /** Treble in dB, -6 to +6. */
    trebleEq: number | null;
    /** Bass in dB, -6 to +6. */
    bassEq: number | null;
    roomEq: boolean | null;
    dialogEnhanced: boolean | null;
    dolbyAudioMode: boolean | null;
    drc: boolean | null;
    /** Raw streaming server state byte. */
    streamingState: number | null;
};

export type ReceiverState = ReceiverFields & {
    /** A TCP session is open. */
    connected: boolean;
    /** The receiver looks like it sits in green standby with IP control off. */
    limitedControl: boolean;
};

export type StateField = keyof ReceiverState;

/** One `(field, value)` pair of a change event. */
export type StateChange = {
    field: StateField;
    value: ReceiverState[StateField];
};

export const RECEIVER_FIELDS: ReadonlyArray<keyof ReceiverFields> = [
    'power',
    'volume',
    'muted',
    'input',
    'surroundMode',
    'model',
    'displayDim',
    'partyMode',
    'partyVolume',
    'trebleEq',
    'bassEq',
    'roomEq',
    'dialogEnhanced',
    'dolbyAudioMode',
    'drc',
    'streamingState',
];

export const STATE_FIELDS: ReadonlyArray<StateField> = [...RECEIVER_FIELDS, 'connected', 'limitedControl'];

export const unknownFields = (): ReceiverFields => ({
    power: null,
    volume: null,
    muted: null,
    input: null,
    surroundMode: null,
    model: null,
    displayDim: null,
    partyMode: null,
    partyVolume: null,
    trebleEq: null,
    bassEq: null,
    roomEq: null,
    dialogEnhanced: null,
    dolbyAudioMode: null,
    drc: null,
    streamingState: null,
});
