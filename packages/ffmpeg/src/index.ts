export * from "./info";
export * from "./errors";
export {
  probeVideo,
  parseProbeOutput,
  runCommand,
  type CommandRunner,
  type ProbeOptions,
  type ProbeOutput
} from "./probe";
export {
  preprocessVideo,
  buildPreprocessOptions,
  createPreprocessTarget,
  removePreprocessTarget,
  setEncoderPath,
  timemarkToSeconds,
  type PreprocessRequest
} from "./preprocess";
