/**
 * Structured receiver error taxonomy.
 * @module protocol/errors
 */
import {ResponseCode} from './constants';

export type ReceiverErrorDomain = 'codec' | 'transport' | 'command' | 'device' | 'config';

export type ReceiverErrorCode =
    | 'ENCODING_ERROR'
    | 'FRAME_INVALID'
    | 'NOT_CONNECTED'
    | 'COMMAND_TIMEOUT'
    | 'CONNECTION_LOST'
    | 'LIMITED_CONTROL'
    | 'COMMAND_REJECTED'
    | 'CONNECTION_CLOSED'
    | 'CONFIG_INVALID';

export class ReceiverError extends Error {
    public readonly domain: ReceiverErrorDomain;
    public readonly code: ReceiverErrorCode;
    public readonly responseCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: ReceiverErrorDomain;
        code: ReceiverErrorCode;
        responseCode?: number;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'ReceiverError';
        this.domain = params.domain;
        this.code = params.code;
        this.responseCode = params.responseCode;
        this.details = params.details;
    }
}

export const isReceiverError = (err: unknown, code?: ReceiverErrorCode): err is ReceiverError =>
    err instanceof ReceiverError && (code === undefined || err.code === code);

const RESPONSE_CODE_MESSAGES = new Map<number, string>([
    [ResponseCode.CommandNotRecognized, 'Receiver did not recognize the command'],
    [ResponseCode.ParameterNotRecognized, 'Receiver did not recognize the parameter'],
    [ResponseCode.CommandInvalid, 'Command is invalid in the current receiver state'],
    [ResponseCode.InvalidDataLength, 'Receiver reported an invalid data length'],
]);

/**
 * Map an error response code from the receiver to a `COMMAND_REJECTED` error.
 */
export const mapResponseCodeToError = (
    responseCode: number,
    command: number,
    details?: Record<string, unknown>,
): ReceiverError => {
    const known = RESPONSE_CODE_MESSAGES.get(responseCode);
    return new ReceiverError({
        message: `${known ?? `Receiver returned response code 0x${responseCode.toString(16)}`} (command 0x${command.toString(16).padStart(2, '0')})`,
        domain: 'device',
        code: 'COMMAND_REJECTED',
        responseCode,
        details: {command, ...details},
    });
};
