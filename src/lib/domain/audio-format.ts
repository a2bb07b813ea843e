import { z } from "zod";

/**
 * Download formats offered for purchased releases
 */
export const AUDIO_FORMATS = [
  "mp3-v0",
  "mp3",
  "flac",
  "aac",
  "ogg-vorbis",
  "alac",
  "wav",
  "aiff",
] as const;

export const audioFormatSchema = z.enum(AUDIO_FORMATS);

export type AudioFormat = z.infer<typeof audioFormatSchema>;
