/**
 * Zod schemas for Takeout "My Activity" JSON records.
 */
import { z } from "zod";

export const TakeoutSubtitleSchema = z.object({
  name: z.string(),
  url: z.string().optional().nullable(),
});

export const TakeoutDetailSchema = z.object({
  name: z.string(),
});

export const TakeoutActivitySchema = z.object({
  title: z.string(),
  titleUrl: z.string().optional().nullable(),
  subtitles: z.array(TakeoutSubtitleSchema).optional().nullable(),
  details: z.array(TakeoutDetailSchema).optional().nullable(),
  time: z.string(),
});

export const TakeoutHistorySchema = z.array(z.unknown());

export type TakeoutActivity = z.infer<typeof TakeoutActivitySchema>;
