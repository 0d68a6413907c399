import { PlaybackVolume, ThresholdDefaults } from "@/constants/sensor";

/**
 * Map kick intensity (0, 2.0] to a playback volume in [0.3, 1.0].
 */
export function toPlaybackVolume(intensity: number): number {
  if (Number.isNaN(intensity)) return PlaybackVolume.MIN;
  const volume = intensity / ThresholdDefaults.MAX_INTENSITY;
  return Math.min(PlaybackVolume.MAX, Math.max(PlaybackVolume.MIN, volume));
}
