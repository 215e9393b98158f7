import {isReceiverError, ReceiverController} from '../src';

type CliOptions = {
    host: string;
    volume: number;
    mute?: boolean;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: process.env.JBL_HOST ?? '127.0.0.1', volume: 30};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--volume=')) {
            const volume = Number(arg.substring('--volume='.length));
            if (Number.isInteger(volume) && volume >= 0 && volume <= 99) options.volume = volume;
        } else if (arg === '--mute') {
            options.mute = true;
        } else if (arg === '--unmute') {
            options.mute = false;
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));
const controller = new ReceiverController({host: options.host, autoReconnect: false});

async function main(): Promise<void> {
    await controller.connection.connect();

    const outcome = await controller.setVolume(options.volume);
    console.log(`Volume ${options.volume}: ${outcome.status}`);
    if (options.mute !== undefined) {
        const muteOutcome = await controller.setMuted(options.mute);
        console.log(`Mute ${options.mute ? 'on' : 'off'}: ${muteOutcome.status}`);
    }
}

main()
    .catch((err) => {
        if (isReceiverError(err)) {
            console.error(`[${err.code}] ${err.message}`);
        } else {
            console.error(err);
        }
        process.exitCode = 1;
    })
    .finally(() => {
        controller.stop();
    });
