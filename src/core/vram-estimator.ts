/**
 * VRAM estimation
 *
 * Admission needs a byte count for every job before it reaches a device.
 * The estimator is pluggable; the default scales per-kind profile sizes by
 * the request's output dimensions.
 */

import type { JobVariant } from '../types/jobs.js';
import { ESTIMATES } from '../config/defaults.js';

export interface VramEstimator {
  /** Bytes the job needs on a device; always a positive integer */
  estimate(job: JobVariant): number;
}

export interface VramProfile {
  imageBytes: number;
  videoBytes: number;
  speechBytes: number;
}

/** Reference output size of the image profile */
const IMAGE_REFERENCE_PIXELS = 1024 * 1024;
/** Reference output size of the video profile */
const VIDEO_REFERENCE_PIXELS = 1280 * 720;
/** Frames covered by the video profile (24 fps for 5 s) */
const VIDEO_REFERENCE_FRAMES = 120;

/**
 * Per-kind profile estimator
 *
 * - image: base x max(1, pixels / 1024²)
 * - video: base x max(1, pixels / (1280x720)) x max(1, frames / 120)
 * - speech: base
 *
 * @example
 * ```typescript
 * const estimator = new ProfileVramEstimator({ imageBytes: 4000 });
 * estimator.estimate({ kind: 'image', params: { ...params, width: 2048, height: 1024 } }); // 8000
 * ```
 */
export class ProfileVramEstimator implements VramEstimator {
  private readonly profile: VramProfile;

  constructor(profile: Partial<VramProfile> = {}) {
    this.profile = {
      imageBytes: profile.imageBytes ?? ESTIMATES.IMAGE_BYTES,
      videoBytes: profile.videoBytes ?? ESTIMATES.VIDEO_BYTES,
      speechBytes: profile.speechBytes ?? ESTIMATES.SPEECH_BYTES,
    };
  }

  public estimate(job: JobVariant): number {
    switch (job.kind) {
      case 'image': {
        const scale = Math.max(1, (job.params.width * job.params.height) / IMAGE_REFERENCE_PIXELS);
        return Math.ceil(this.profile.imageBytes * scale);
      }
      case 'video': {
        const { width, height, fps, durationSeconds } = job.params;
        const spatial = Math.max(1, (width * height) / VIDEO_REFERENCE_PIXELS);
        const temporal = Math.max(1, (fps * durationSeconds) / VIDEO_REFERENCE_FRAMES);
        return Math.ceil(this.profile.videoBytes * spatial * temporal);
      }
      case 'speech':
        return Math.ceil(this.profile.speechBytes);
    }
  }
}
