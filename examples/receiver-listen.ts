import {INPUT_SOURCE_NAMES, isInputSource, MODEL_NAMES, ReceiverController, SURROUND_MODE_NAMES, type StateChange} from '../src';

type CliOptions = {
    host: string;
    name?: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: process.env.JBL_HOST ?? '127.0.0.1'};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--name=')) {
            options.name = arg.substring('--name='.length);
        }
    }
    return options;
}

function describeChange({field, value}: StateChange): string {
    if (value === null) return `${field}=unknown`;
    if (field === 'input' && typeof value === 'number' && isInputSource(value)) {
        return `input=${INPUT_SOURCE_NAMES[value]}`;
    }
    return `${field}=${String(value)}`;
}

const options = parseArgs(process.argv.slice(2));
const controller = new ReceiverController({host: options.host, name: options.name});

controller.on('connect', () => {
    console.log(`Connected to receiver ${options.host}`);
});

controller.on('change', (changes, state) => {
    console.log(changes.map(describeChange).join(' '));
    if (changes.some((change) => change.field === 'model') && state.model !== null) {
        console.log(`Model: ${MODEL_NAMES[state.model]}`);
    }
    if (changes.some((change) => change.field === 'surroundMode') && state.surroundMode !== null) {
        console.log(`Surround: ${SURROUND_MODE_NAMES[state.surroundMode]}`);
    }
});

controller.on('disconnect', (reason) => {
    console.log(`Disconnected (${reason.code}: ${reason.message})`);
});

async function main(): Promise<void> {
    await controller.start();
    console.log('Listening for receiver updates. Press Ctrl+C to stop.');
}

process.on('SIGINT', () => {
    controller.stop();
    process.exit(0);
});

main().catch((err) => {
    console.error(err);
    controller.stop();
    process.exit(1);
});
