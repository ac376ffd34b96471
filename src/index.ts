// src/index.ts

export type * from './@types/index.ts';
export {
    BufferSizeMismatchError,
    InvalidGeometryError,
    PrintCoreError,
    UnsupportedAlgorithmError,
} from './core/errors.ts';
export {
    assertPixelBuffer,
    createPixelBuffer,
    getSample,
    monoToGray,
    pixelBufferFromSamples,
} from './core/pixelBuffer/pixelBuffer.ts';
export { applyEnhancement, IDENTITY_ENHANCEMENT } from './core/enhancement/enhancer.ts';
export { labelPixelSize } from './core/labelFitting/geometry.ts';
export { fitToLabel } from './core/labelFitting/labelFitter.ts';
export { resample } from './core/labelFitting/resample.ts';
export { rotate90 } from './core/labelFitting/rotate.ts';
export { dither } from './core/dithering/dither.ts';
export { parseDitherAlgorithm, SupportedDitherAlgorithms } from './core/dithering/ditherAlgorithms.ts';
export { encodePng, toSpoolFormat } from './core/output/outputEncoder.ts';
export { loadGrayscaleImage } from './core/imageProcessing/processor.ts';
export { getLabel, labelsForBrand, loadLabelCatalog } from './core/labels/labelCatalog.ts';
export { runPrintJob } from './core/printJob/index.ts';
export { LpSpooler } from './utils/printing/LpSpooler.ts';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
