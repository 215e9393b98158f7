import {describe, expect, it} from 'vitest';

import {
    Command,
    decodeStatusFrame,
    encodeStatusFrame,
    InputSource,
    ReceiverError,
    ResponseCode,
    silentLogger,
    StateSynchronizer,
    type ReceiverState,
    type StateChange,
    type StatusFrame,
} from '../src';

const statusFrame = (command: number, data: number[], responseCode = 0): StatusFrame => {
    const result = decodeStatusFrame(encodeStatusFrame({command, responseCode, data}));
    if (result.kind !== 'frame') throw new Error(`expected a frame, got ${result.kind}`);
    return result.frame;
};

const refused = (): ReceiverError => new ReceiverError({
    message: 'connect ECONNREFUSED',
    domain: 'transport',
    code: 'CONNECTION_LOST',
    details: {errno: 'ECONNREFUSED'},
});

const createSync = (limitedControlThreshold?: number): StateSynchronizer =>
    new StateSynchronizer({limitedControlThreshold, logger: silentLogger()});

describe('StateSynchronizer', () => {
    it('starts with every device field unknown', () => {
        const state = createSync().getState();
        expect(state.connected).toBe(false);
        expect(state.limitedControl).toBe(false);
        expect(state.power).toBeNull();
        expect(state.volume).toBeNull();
        expect(Object.isFrozen(state)).toBe(true);
    });

    it('emits only the fields that changed', () => {
        const sync = createSync();
        const events: StateChange[][] = [];
        sync.on('change', (changes) => events.push(changes));

        sync.applyFrame(statusFrame(Command.Volume, [35]));
        sync.applyFrame(statusFrame(Command.Volume, [35]));
        sync.applyFrame(statusFrame(Command.InputSource, [InputSource.Optical]));

        expect(events).toEqual([
            [{field: 'volume', value: 35}],
            [{field: 'input', value: InputSource.Optical}],
        ]);
    });

    it('ignores unknown status codes and error responses', () => {
        const sync = createSync();
        expect(sync.applyFrame(statusFrame(0x42, [1]))).toEqual([]);
        expect(sync.applyFrame(statusFrame(Command.Volume, [], ResponseCode.CommandInvalid))).toEqual([]);
        expect(sync.getState().volume).toBeNull();
    });

    it('lets the device-reported value replace an optimistic one', () => {
        const sync = createSync();
        sync.applyOptimistic({volume: 35});
        expect(sync.getState().volume).toBe(35);

        const frame = statusFrame(Command.Volume, [30]);
        sync.applyFrame(frame);
        expect(sync.reconcile({command: Command.Volume, expected: {volume: 35}}, frame)).toBe('acknowledged');
        expect(sync.getState().volume).toBe(30);
    });

    it('reports unrelated frames and rejections', () => {
        const sync = createSync();
        sync.applyOptimistic({muted: true});
        const pending = {command: Command.Mute, expected: {muted: true}};

        expect(sync.reconcile(pending, statusFrame(Command.Volume, [10]))).toBe('unrelated');
        expect(sync.getState().muted).toBe(true);
        expect(sync.reconcile(pending, statusFrame(Command.Mute, [], ResponseCode.ParameterNotRecognized))).toBe('rejected');
        expect(sync.getState().muted).toBeNull();
    });

    it('reverts an optimistic value', () => {
        const sync = createSync();
        sync.applyFrame(statusFrame(Command.Volume, [20]));
        sync.applyOptimistic({volume: 50});
        const changes = sync.revertOptimistic({volume: 50});
        expect(changes).toEqual([{field: 'volume', value: 20}]);
    });

    it('clears every device field on disconnect with exactly one snapshot', () => {
        const sync = createSync();
        sync.markConnected();
        sync.applyFrame(statusFrame(Command.Power, [1]));
        sync.applyFrame(statusFrame(Command.Volume, [40]));
        sync.applyOptimistic({muted: true});

        const snapshots: Readonly<ReceiverState>[] = [];
        let changes = 0;
        sync.on('snapshot', (state) => snapshots.push(state));
        sync.on('change', () => {
            changes += 1;
        });
        sync.markDisconnected();

        expect(snapshots).toHaveLength(1);
        expect(changes).toBe(0);
        expect(snapshots[0]).toMatchObject({connected: false, power: null, volume: null, muted: null});
    });

    it('infers green standby after repeated failures and clears it on the next frame', () => {
        const sync = createSync(2);
        sync.markConnected();
        sync.markDisconnected();

        const events: StateChange[][] = [];
        sync.on('change', (changes) => events.push(changes));
        expect(sync.recordConnectFailure(refused())).toEqual([]);
        sync.recordCommandTimeout();

        expect(events).toEqual([[
            {field: 'power', value: 'green-standby'},
            {field: 'limitedControl', value: true},
        ]]);

        sync.applyFrame(statusFrame(Command.Power, [1]));
        expect(sync.getState()).toMatchObject({limitedControl: false, power: 'on'});
    });

    it('never infers green standby before the receiver was reached', () => {
        const sync = createSync(2);
        for (let i = 0; i < 5; i++) sync.recordConnectFailure(refused());
        expect(sync.getState().limitedControl).toBe(false);
    });
});
