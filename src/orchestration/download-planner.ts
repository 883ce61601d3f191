import { NotFoundError } from "../core/errors";
import { slugify } from "../core/normalize";
import type { DownloadPlan, Highlight, MediaAsset, MediaContent, Story } from "../domain/models";
import type { StatsClient } from "../platforms/adapter";
import { guessExtension } from "../platforms/instagram/parsers";

function storyAsset(story: Story, index: number, group: string | null): MediaAsset | null {
  const url = story.videoUrl ?? story.imageUrl;
  if (!url) return null;
  return {
    url,
    kind: story.isVideo ? "video" : "image",
    index,
    code: story.code ?? story.id,
    extension: guessExtension(url, story.isVideo ? ".mp4" : ".jpg"),
    group,
  };
}

export function planMediaDownload(content: MediaContent): DownloadPlan {
  if (content.assets.length === 0) {
    throw new NotFoundError(`No downloadable files found for ${content.reel.shortcode}.`, "no_assets");
  }
  return {
    downloadKind: "media",
    targetLabel: content.reel.shortcode,
    assets: content.assets,
    details: { media: content.reel },
  };
}

export function planAudioDownload(content: MediaContent): DownloadPlan {
  const audio = content.audio;
  if (!audio) {
    throw new NotFoundError(`No downloadable audio track found for ${content.reel.shortcode}.`, "no_audio");
  }
  return {
    downloadKind: "media_audio",
    targetLabel: content.reel.shortcode,
    assets: [
      { url: audio.url, kind: "audio", index: 1, code: content.reel.shortcode, extension: audio.extension, group: null },
    ],
    details: { media: content.reel, audioTrack: { title: audio.title, artist: audio.artist } },
  };
}

export function planStoriesDownload(username: string, stories: Story[]): DownloadPlan {
  const assets = stories.flatMap((story, i) => storyAsset(story, i + 1, null) ?? []);
  return {
    downloadKind: "stories",
    targetLabel: username,
    assets,
    details: { username, storyCount: stories.length },
  };
}

export interface HighlightsPlanOptions {
  titleFilter?: string | null;
  signal?: AbortSignal;
}

/** Fetches the items of every highlight whose title contains the filter (case-insensitive). */
export async function planHighlightsDownload(
  client: StatsClient,
  username: string,
  highlights: Highlight[],
  options: HighlightsPlanOptions = {}
): Promise<DownloadPlan> {
  const filter = options.titleFilter?.trim().toLowerCase() || null;
  const selected = filter ? highlights.filter((h) => (h.title ?? "").toLowerCase().includes(filter)) : highlights;

  const assets: MediaAsset[] = [];
  for (const highlight of selected) {
    const items = await client.getHighlightItems(highlight.id, options.signal);
    const group = `${slugify(highlight.title ?? "", "highlight")}_${highlight.id}`;
    items.forEach((story, i) => {
      const asset = storyAsset(story, i + 1, group);
      if (asset) assets.push(asset);
    });
  }

  return {
    downloadKind: "highlights",
    targetLabel: username,
    assets,
    details: {
      username,
      titleFilter: options.titleFilter ?? null,
      highlights: selected.map((h) => ({ id: h.id, title: h.title, mediaCount: h.mediaCount })),
    },
  };
}
