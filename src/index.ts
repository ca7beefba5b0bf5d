export { mergeImage, taggedOutput } from './merge/index';
export type { MergeSpec, MergeOptions, MergedImage, ComposerName } from './merge/index';
export {
  ESP_IMAGE_MAGIC, FLASH_FREQS, FLASH_MODES, FLASH_SIZES, FLASH_SIZE_NAMES, validateLayout,
} from './merge/layout';
export type {
  FlashParams, FlashMode, FlashFreq, FlashSize, Segment, SegmentDef,
} from './merge/layout';
export { composeImage, resolveEsptool } from './merge/compose';
export type { VerificationResult } from './merge/verify';

export { runSession, SessionController } from './session/index';
export type {
  SessionOptions, SessionOutcome, SessionReason, SessionState, DeviceSession,
} from './session/index';
export type { ResetStrategy } from './session/reset';
export { SerialPortPromise } from './serialport/serialport-promise';
export type { SerialChannel } from './serialport/serialport-promise';

export { findCompiler } from './toolchain/index';
export type { ToolchainResult } from './toolchain/index';

export { Pipeline, runPipeline, expandSteps } from './pipeline/index';
export type { Step, StepName, PipelineDeps, PipelineResult } from './pipeline/index';
export { loadConfig, parseConfig } from './config';
export type { FirmwareConfig } from './config';

export { Logger } from './util/logger';
export type { StdOut } from './util/logger';
export * from './errors';
