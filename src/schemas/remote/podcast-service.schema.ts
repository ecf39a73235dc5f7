import { z } from 'zod'

const dateString = z.string().datetime({ offset: true })

export const AuthResponseSchema = z.object({
  user: z.object({
    id: z.string(),
    email: z.string(),
    apiKey: z.string().min(1),
  }),
})

export const SubscribedPodcastSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  feedUrl: z.string(),
  description: z.string().nullish(),
  artworkUrl: z.string().nullish(),
  author: z.string().nullish(),
})

export const PodcastsResponseSchema = z.object({
  podcasts: z.array(SubscribedPodcastSchema),
})

export const SubscribeResponseSchema = z.object({
  podcast: z.object({
    id: z.string(),
  }),
})

export const SuccessResponseSchema = z.object({
  success: z.boolean(),
})

export const ProgressRecordSchema = z.object({
  id: z.string(),
  episodeId: z.string(),
  positionSeconds: z.number(),
  durationSeconds: z.number().nullish(),
  completed: z.boolean(),
  lastUpdatedAt: dateString,
})

export const ProgressResponseSchema = z.object({
  progress: z.array(ProgressRecordSchema),
})

export const ProgressUpdateResponseSchema = z.object({
  progress: ProgressRecordSchema,
})

export const BulkProgressResponseSchema = z.object({
  results: z.array(
    z.object({
      episodeId: z.string(),
      success: z.boolean(),
      error: z.string().nullish(),
    }),
  ),
})

export const EpisodesResponseSchema = z.object({
  episodes: z.array(
    z.object({
      id: z.string(),
      audioUrl: z.string(),
    }),
  ),
  total: z.number().optional(),
})

export const QueueItemSchema = z.object({
  id: z.string(),
  episodeId: z.string(),
  position: z.number(),
})

export const QueueResponseSchema = z.object({
  queue: z.array(QueueItemSchema),
})

export const AddToQueueResponseSchema = z.object({
  queueItem: QueueItemSchema,
  queue: z.array(QueueItemSchema),
})

export const PlaylistSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
})

export const PlaylistsResponseSchema = z.object({
  playlists: z.array(PlaylistSchema),
})

export const CreatePlaylistResponseSchema = z.object({
  playlist: PlaylistSchema,
})

export const PlaylistDetailResponseSchema = z.object({
  playlist: PlaylistSchema.extend({
    items: z.array(
      z.object({
        id: z.string(),
        position: z.number(),
        episode: z.object({ id: z.string() }).nullish(),
      }),
    ),
  }),
})

// Stored cursor: the last subscription snapshot, or the newest progress
// update seen
export const SubscriptionSnapshotCursorSchema = z.object({
  feeds: z.array(z.string()),
})

export type SubscribedPodcast = z.infer<typeof SubscribedPodcastSchema>
export type ProgressRecord = z.infer<typeof ProgressRecordSchema>
