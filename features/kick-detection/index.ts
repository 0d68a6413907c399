export type { DetectorState, ThresholdConfig, KickEvent, KickListener } from "./types";
export { KickDetector, type KickDetectorOptions } from "./kick-detector";
export { toPlaybackVolume } from "./playback-volume";
