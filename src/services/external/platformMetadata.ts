/**
 * Platform Metadata API
 * Read-only lookups against public oEmbed / search endpoints.
 * Nothing here downloads audio.
 */

import { z } from "zod";
import type { FetchLike } from "../../types/fetch.js";

export type Platform = "spotify" | "apple" | "youtube" | "soundcloud";

export interface PlatformMetadata {
  title?: string;
  author?: string;
  thumbnail?: string;
}

const oembedSchema = z.object({
  title: z.string().optional(),
  author_name: z.string().optional(),
  thumbnail_url: z.string().optional(),
});

const itunesSearchSchema = z.object({
  results: z.array(
    z.object({
      trackName: z.string().optional(),
      collectionName: z.string().optional(),
      artistName: z.string().optional(),
      artworkUrl100: z.string().optional(),
    })
  ),
});

const OEMBED_ENDPOINTS: Record<Exclude<Platform, "apple">, string> = {
  spotify: "https://open.spotify.com/oembed",
  youtube: "https://www.youtube.com/oembed",
  soundcloud: "https://soundcloud.com/oembed",
};

const ITUNES_SEARCH_URL = "https://itunes.apple.com/search";

async function getJson(fetchImpl: FetchLike, url: URL, timeoutMs: number): Promise<unknown> {
  const response = await fetchImpl(url.toString(), { signal: AbortSignal.timeout(timeoutMs) });
  if (!response.ok) {
    throw new Error(`${url.hostname} responded ${response.status}`);
  }
  return response.json();
}

/**
 * oEmbed lookup for Spotify, YouTube and SoundCloud links.
 */
export async function fetchOembed(
  fetchImpl: FetchLike,
  platform: Exclude<Platform, "apple">,
  link: string,
  timeoutMs: number
): Promise<PlatformMetadata> {
  const url = new URL(OEMBED_ENDPOINTS[platform]);
  url.searchParams.set("url", link);
  if (platform !== "spotify") url.searchParams.set("format", "json");

  const data = oembedSchema.parse(await getJson(fetchImpl, url, timeoutMs));
  return {
    title: data.title,
    author: data.author_name,
    thumbnail: data.thumbnail_url,
  };
}

/**
 * Apple Music has no public oEmbed; the last path segment of the link is
 * used as an iTunes Search term instead, so matches are best-effort.
 */
export async function fetchItunesSearch(
  fetchImpl: FetchLike,
  link: URL,
  timeoutMs: number
): Promise<PlatformMetadata> {
  const lastSegment = link.pathname.split("/").filter(Boolean).pop() ?? "";
  const term = lastSegment.replace(/\.[^.]*$/, "");

  const url = new URL(ITUNES_SEARCH_URL);
  url.searchParams.set("term", term);
  url.searchParams.set("limit", "1");

  const { results } = itunesSearchSchema.parse(await getJson(fetchImpl, url, timeoutMs));
  const first = results[0];
  if (!first) return {};

  return {
    title: first.trackName || first.collectionName,
    author: first.artistName,
    thumbnail: first.artworkUrl100,
  };
}
