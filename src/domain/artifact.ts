/**
 * Artifact key layout.
 *
 * An artifact is a stored object identified by (userId, taskId, kind).
 * Its presence in object storage is the only durable record of progress.
 *
 *   {userId}/{taskId}.mp4               original
 *   {userId}/{taskId}_processed.mp4     variant v1
 *   {userId}/{taskId}_processed_v2.mp4  variant v2
 *   {userId}/{taskId}.jpg               thumbnail
 */

export type ArtifactKind = 'original' | 'processed' | 'processed_v2' | 'thumbnail';

/** Kinds that are videos; what the stream endpoint accepts. */
export type VideoKind = Exclude<ArtifactKind, 'thumbnail'>;

export const VIDEO_KINDS: readonly VideoKind[] = ['original', 'processed', 'processed_v2'];

/** Downstream transformation selector carried on job messages. */
export type Variant = 'v1' | 'v2';

export const VARIANTS: readonly Variant[] = ['v1', 'v2'];

const VIDEO_EXTENSION = '.mp4';
const IMAGE_EXTENSION = '.jpg';

const KIND_SUFFIX: Record<ArtifactKind, string> = {
  original: '',
  processed: '_processed',
  processed_v2: '_processed_v2',
  thumbnail: '',
};

export const VARIANT_KIND: Record<Variant, VideoKind> = {
  v1: 'processed',
  v2: 'processed_v2',
};

export const CONTENT_TYPES: Record<ArtifactKind, string> = {
  original: 'video/mp4',
  processed: 'video/mp4',
  processed_v2: 'video/mp4',
  thumbnail: 'image/jpeg',
};

export function isVideoKind(value: unknown): value is VideoKind {
  return VIDEO_KINDS.some((kind) => kind === value);
}

/** Listing prefix for everything a user owns. */
export function userPrefix(userId: string): string {
  return `${userId}/`;
}

/** Object name relative to the user prefix, without extension. */
export function artifactStem(taskId: string, kind: ArtifactKind): string {
  return `${taskId}${KIND_SUFFIX[kind]}`;
}

/** Full storage key for an artifact. */
export function artifactKey(userId: string, taskId: string, kind: ArtifactKind): string {
  const extension = kind === 'thumbnail' ? IMAGE_EXTENSION : VIDEO_EXTENSION;
  return `${userPrefix(userId)}${artifactStem(taskId, kind)}${extension}`;
}

/** Summary row for the list endpoint. */
export interface VideoSummary {
  taskId: string;
  hasOriginal: boolean;
  hasProcessed: boolean;
  hasProcessedV2: boolean;
}

/**
 * Group a user's object names (relative to the user prefix) by task.
 * Names without the video extension are accepted too; thumbnails and other
 * non-video objects are skipped.
 */
export function groupVideoNames(names: Iterable<string>): VideoSummary[] {
  const videos = new Map<string, VideoSummary>();

  for (const name of names) {
    if (name.endsWith(IMAGE_EXTENSION)) continue;
    const stem = name.endsWith(VIDEO_EXTENSION) ? name.slice(0, -VIDEO_EXTENSION.length) : name;
    if (!stem) continue;

    let kind: VideoKind = 'original';
    let taskId = stem;
    if (stem.endsWith(KIND_SUFFIX.processed_v2)) {
      kind = 'processed_v2';
      taskId = stem.slice(0, -KIND_SUFFIX.processed_v2.length);
    } else if (stem.endsWith(KIND_SUFFIX.processed)) {
      kind = 'processed';
      taskId = stem.slice(0, -KIND_SUFFIX.processed.length);
    }

    let summary = videos.get(taskId);
    if (!summary) {
      summary = { taskId, hasOriginal: false, hasProcessed: false, hasProcessedV2: false };
      videos.set(taskId, summary);
    }
    if (kind === 'processed_v2') summary.hasProcessedV2 = true;
    else if (kind === 'processed') summary.hasProcessed = true;
    else summary.hasOriginal = true;
  }

  return [...videos.values()];
}

/** True when `names` holds the artifact, stored with or without its extension. */
export function hasVideoArtifact(names: ReadonlySet<string>, taskId: string, kind: VideoKind): boolean {
  const stem = artifactStem(taskId, kind);
  return names.has(stem) || names.has(`${stem}${VIDEO_EXTENSION}`);
}
