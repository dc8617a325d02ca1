export { Recorder, readRecording, recordedSteps } from "./recorder.js";
export type { RecorderOptions } from "./recorder.js";
export {
  RECORDING_SUFFIX,
  recordingFileName,
  parseRecordingFileName,
  isRecordingFileName,
  listRecordings,
} from "./recording-name.js";
export type { RecordingName } from "./recording-name.js";
export { PlaybackPolicy } from "./player.js";
export type { PlaybackOptions } from "./player.js";
export { ReplayClient } from "./replay-client.js";
export { redactNote } from "./redact.js";
