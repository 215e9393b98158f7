/**
 * Per-model feature rules.
 * @module protocol/capabilities
 */
import {InputSource, ReceiverModel, SurroundMode} from './constants';

/** Models with the larger chassis (party zone, DRC, six HDMI inputs, phono). */
const EXTENDED_MODELS: ReadonlySet<ReceiverModel> = new Set([
    ReceiverModel.MA710,
    ReceiverModel.MA7100HP,
    ReceiverModel.MA9100HP,
]);

const EXTENDED_ONLY_INPUTS: ReadonlySet<InputSource> = new Set([
    InputSource.Hdmi5,
    InputSource.Hdmi6,
    InputSource.Phono,
]);

const EXTENDED_ONLY_MODES: ReadonlySet<SurroundMode> = new Set([
    SurroundMode.DolbySurround,
    SurroundMode.DtsNeuralX,
]);

/** Returns `true` for models with party mode, party volume and DRC. */
export const hasExtendedFeatures = (model: ReceiverModel): boolean => EXTENDED_MODELS.has(model);

export const supportsInput = (model: ReceiverModel, input: InputSource): boolean =>
    hasExtendedFeatures(model) || !EXTENDED_ONLY_INPUTS.has(input);

export const supportsSurroundMode = (model: ReceiverModel, mode: SurroundMode): boolean => {
    if (mode === SurroundMode.DolbyProLogicII) return model === ReceiverModel.MA510;
    return hasExtendedFeatures(model) || !EXTENDED_ONLY_MODES.has(mode);
};

/** Inputs selectable on `model`, in front-panel order. */
export const listInputs = (model: ReceiverModel): InputSource[] =>
    Object.values(InputSource)
        .filter((value): value is InputSource => typeof value === 'number')
        .filter((input) => supportsInput(model, input));

/** Surround modes selectable on `model`. */
export const listSurroundModes = (model: ReceiverModel): SurroundMode[] =>
    Object.values(SurroundMode)
        .filter((value): value is SurroundMode => typeof value === 'number')
        .filter((mode) => supportsSurroundMode(model, mode));
