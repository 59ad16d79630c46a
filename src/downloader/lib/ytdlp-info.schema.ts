import { z } from 'zod';

/**
 * Subset of yt-dlp's --dump-single-json output that tubescribe reads.
 * Unknown keys are stripped; yt-dlp reports missing values as null.
 */
export const YtdlpInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  channel: z.string().nullish(),
  uploader: z.string().nullish(),
  channel_url: z.string().nullish(),
  upload_date: z.string().nullish(),
  duration: z.number().nullish(),
  view_count: z.number().nullish(),
  like_count: z.number().nullish(),
  channel_follower_count: z.number().nullish(),
  description: z.string().nullish(),
  chapters: z
    .array(
      z.object({
        title: z.string().nullish(),
        start_time: z.number(),
        end_time: z.number().nullish(),
      }),
    )
    .nullish(),
});

export type YtdlpInfo = z.infer<typeof YtdlpInfoSchema>;
