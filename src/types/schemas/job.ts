/**
 * Job submission schemas
 *
 * Requests arrive from the image/video/speech services as untyped JSON and are
 * resolved into a tagged variant here, before they reach the scheduler.
 *
 * @module schemas/job
 */

import { z } from 'zod';
import { PRIORITY_TIERS } from '../devices.js';

export const ImageJobParamsSchema = z.object({
  prompt: z.string().min(1, 'Prompt cannot be empty'),
  negativePrompt: z.string().optional(),
  width: z.number().int().positive().max(8192).default(1024),
  height: z.number().int().positive().max(8192).default(1024),
  steps: z.number().int().positive().max(500).default(30),
  model: z.string().min(1).default('sdxl'),
});

export const VideoJobParamsSchema = z
  .object({
    prompt: z.string().min(1).optional(),
    sourceUrl: z.string().url().optional(),
    width: z.number().int().positive().max(7680).default(1280),
    height: z.number().int().positive().max(4320).default(720),
    fps: z.number().int().positive().max(120).default(24),
    durationSeconds: z.number().positive().max(600).default(5),
    model: z.string().min(1).default('fast-hunyuan'),
  })
  .refine((data) => data.prompt !== undefined || data.sourceUrl !== undefined, {
    message: 'prompt or sourceUrl is required',
    path: ['prompt'],
  });

export const SpeechJobParamsSchema = z.object({
  text: z.string().min(1, 'Text cannot be empty').max(20000),
  voice: z.string().min(1).default('default'),
  sampleRate: z.number().int().positive().default(44100),
  model: z.string().min(1).default('fish-speech'),
});

const CommonJobFields = {
  id: z.string().min(1).max(128).optional(),
  priority: z.enum(PRIORITY_TIERS).default('normal'),
  /** Explicit VRAM requirement in bytes; bypasses the estimator */
  vramEstimate: z.number().int().positive().optional(),
  tenantId: z.string().min(1).optional(),
};

export const JobRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('image'), params: ImageJobParamsSchema, ...CommonJobFields }),
  z.object({ kind: z.literal('video'), params: VideoJobParamsSchema, ...CommonJobFields }),
  z.object({ kind: z.literal('speech'), params: SpeechJobParamsSchema, ...CommonJobFields }),
]);

export type ImageJobParams = z.infer<typeof ImageJobParamsSchema>;
export type VideoJobParams = z.infer<typeof VideoJobParamsSchema>;
export type SpeechJobParams = z.infer<typeof SpeechJobParamsSchema>;

/** Validated request, defaults applied */
export type JobRequest = z.infer<typeof JobRequestSchema>;

/** Request as callers write it */
export type JobRequestInput = z.input<typeof JobRequestSchema>;
