/**
 * JBL MA-series IP control constants.
 * @module protocol/constants
 *
 * Protocol reference:
 * - JBL Synthesis MA Series IP Control Protocol, v1.7
 */
export const RECEIVER_PORT = 50000;
export const RECEIVER_DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const RECEIVER_DEFAULT_RECONNECT_DELAY_MS = 1000;
export const RECEIVER_DEFAULT_RECONNECT_MAX_DELAY_MS = 30000;
export const RECEIVER_DEFAULT_RECONNECT_JITTER = 0.2;
export const RECEIVER_DEFAULT_HEARTBEAT_MS = 10000;
export const RECEIVER_DEFAULT_IDLE_TIMEOUT_MS = 30000;
export const RECEIVER_DEFAULT_ACK_TIMEOUT_MS = 3000;
export const RECEIVER_DEFAULT_MAX_RETRIES = 2;
export const RECEIVER_DEFAULT_LIMITED_CONTROL_THRESHOLD = 3;
export const RECEIVER_DEFAULT_MAX_BUFFER_BYTES = 4096;

/** First byte of a controller -> receiver frame. */
export const COMMAND_START = 0x23;
/** Two-byte marker opening a receiver -> controller frame. */
export const RESPONSE_START = Buffer.from([0x02, 0x23]);
export const FRAME_END = 0x0d;
/** Operand asking the receiver to report the current value. */
export const REQUEST_DATA = 0xf0;
/** Upper bound for a declared operand length before the frame is treated as corrupt. */
export const MAX_FRAME_DATA_LENGTH = 64;

export const VOLUME_MIN = 0;
export const VOLUME_MAX = 99;
export const EQ_MIN_DB = -6;
export const EQ_MAX_DB = 6;

export enum Command {
    Power = 0x00,
    DisplayDim = 0x01,
    Version = 0x02,
    SimulateIr = 0x04,
    InputSource = 0x05,
    Volume = 0x06,
    Mute = 0x07,
    SurroundMode = 0x08,
    PartyMode = 0x09,
    PartyVolume = 0x0a,
    TrebleEq = 0x0b,
    BassEq = 0x0c,
    RoomEq = 0x0d,
    DialogEnhanced = 0x0e,
    DolbyAudioMode = 0x0f,
    Drc = 0x10,
    StreamingState = 0x11,
    Initialization = 0x50,
    Heartbeat = 0x51,
    Reboot = 0x52,
    FactoryReset = 0x53,
}

export enum ResponseCode {
    StatusUpdate = 0x00,
    CommandNotRecognized = 0xc1,
    ParameterNotRecognized = 0xc2,
    CommandInvalid = 0xc3,
    InvalidDataLength = 0xc4,
}

export enum ReceiverModel {
    MA510 = 0x01,
    MA710 = 0x02,
    MA7100HP = 0x03,
    MA9100HP = 0x04,
}

export enum InputSource {
    TvArc = 0x01,
    Hdmi1 = 0x02,
    Hdmi2 = 0x03,
    Hdmi3 = 0x04,
    Hdmi4 = 0x05,
    Hdmi5 = 0x06,
    Hdmi6 = 0x07,
    Coax = 0x08,
    Optical = 0x09,
    Analog1 = 0x0a,
    Analog2 = 0x0b,
    Phono = 0x0c,
    Bluetooth = 0x0d,
    Network = 0x0e,
}

export enum SurroundMode {
    DolbySurround = 0x01,
    DtsNeuralX = 0x02,
    Stereo20 = 0x03,
    Stereo21 = 0x04,
    AllStereo = 0x05,
    Native = 0x06,
    DolbyProLogicII = 0x07,
}

/** Software component selectors for {@link Command.Version} queries. */
export enum VersionType {
    IpControl = 0xf0,
    Host = 0xf1,
    Dsp = 0xf2,
    Osd = 0xf3,
    Net = 0xf4,
}

export const INPUT_SOURCE_NAMES: Record<InputSource, string> = {
    [InputSource.TvArc]: 'TV (ARC)',
    [InputSource.Hdmi1]: 'HDMI 1',
    [InputSource.Hdmi2]: 'HDMI 2',
    [InputSource.Hdmi3]: 'HDMI 3',
    [InputSource.Hdmi4]: 'HDMI 4',
    [InputSource.Hdmi5]: 'HDMI 5',
    [InputSource.Hdmi6]: 'HDMI 6',
    [InputSource.Coax]: 'Coax',
    [InputSource.Optical]: 'Optical',
    [InputSource.Analog1]: 'Analog 1',
    [InputSource.Analog2]: 'Analog 2',
    [InputSource.Phono]: 'Phono',
    [InputSource.Bluetooth]: 'Bluetooth',
    [InputSource.Network]: 'Network',
};

export const SURROUND_MODE_NAMES: Record<SurroundMode, string> = {
    [SurroundMode.DolbySurround]: 'Dolby Surround',
    [SurroundMode.DtsNeuralX]: 'DTS Neural:X',
    [SurroundMode.Stereo20]: 'Stereo 2.0',
    [SurroundMode.Stereo21]: 'Stereo 2.1',
    [SurroundMode.AllStereo]: 'All Stereo',
    [SurroundMode.Native]: 'Native',
    [SurroundMode.DolbyProLogicII]: 'Dolby Pro Logic II',
};

export const MODEL_NAMES: Record<ReceiverModel, string> = {
    [ReceiverModel.MA510]: 'MA510',
    [ReceiverModel.MA710]: 'MA710',
    [ReceiverModel.MA7100HP]: 'MA7100HP',
    [ReceiverModel.MA9100HP]: 'MA9100HP',
};

/** NEC-format (24-bit) IR codes accepted by {@link Command.SimulateIr}. */
export enum IrKey {
    Power = 0x010e03,
    Up = 0x010e99,
    Down = 0x010e59,
    Left = 0x010e83,
    Right = 0x010e43,
    Ok = 0x010e21,
    Menu = 0x010eca,
    Back = 0x010ea1,
    Dim = 0x010ec9,
    VolumeUp = 0x010ee3,
    VolumeDown = 0x010e13,
    Mute = 0x010ec3,
    SourceUp = 0x010e8c,
    SourceDown = 0x010e0c,
    SurroundUp = 0x010ef4,
    SurroundDown = 0x010e74,
    MainPowerOn = 0x010ed9,
    MainPowerOff = 0x010ef9,
    Tv = 0x010e71,
    Hdmi1 = 0x010e11,
    Hdmi2 = 0x010e91,
    Hdmi3 = 0x010e51,
    Hdmi4 = 0x010ed1,
    Hdmi5 = 0x010e31,
    Hdmi6 = 0x010eb1,
    Coax = 0x010e81,
    Optical = 0x010edb,
    Analog1 = 0x010e23,
    Analog2 = 0x010e33,
    Phono = 0x010e0b,
    Bluetooth = 0x010e53,
    Network = 0x010ed3,
    PartyOn = 0x010e73,
    PartyOff = 0x010e8b,
    PartyVolumeUp = 0x010e39,
    PartyVolumeDown = 0x010eb9,
}
