/**
 * Metadata Service
 * Display-only lookup of title, author and artwork for streaming-platform links.
 * Never touches the conversion pipeline or the filesystem.
 */

import type { FetchLike } from "../../types/fetch.js";
import { ValidationError } from "../../utils/errors.js";
import {
  fetchItunesSearch,
  fetchOembed,
  type Platform,
  type PlatformMetadata,
} from "../external/platformMetadata.js";

export interface MetadataResult extends PlatformMetadata {
  /** Lowercase host of the link */
  source: string;
  url: string;
  platform: Platform | null;
}

export interface MetadataServiceOptions {
  timeoutMs: number;
  fetch?: FetchLike;
}

export const PLATFORM_NAMES: Record<Platform, string> = {
  spotify: "Spotify",
  apple: "Apple Music",
  youtube: "YouTube",
  soundcloud: "SoundCloud",
};

const PLATFORM_DOMAINS: ReadonlyArray<readonly [Platform, readonly string[]]> = [
  ["spotify", ["open.spotify.com"]],
  ["apple", ["music.apple.com", "itunes.apple.com"]],
  ["youtube", ["youtube.com", "youtu.be"]],
  ["soundcloud", ["soundcloud.com"]],
];

/**
 * Platform owning host: the domain itself or one of its subdomains.
 */
export function detectPlatform(host: string): Platform | null {
  for (const [platform, domains] of PLATFORM_DOMAINS) {
    if (domains.some((domain) => host === domain || host.endsWith(`.${domain}`))) {
      return platform;
    }
  }
  return null;
}

export class MetadataService {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: MetadataServiceOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Best-effort lookup: any platform failure leaves the fields empty.
   */
  async lookup(link: string): Promise<MetadataResult> {
    let url: URL;
    try {
      url = new URL(link);
    } catch (error) {
      throw new ValidationError("Provide a valid link.", error);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ValidationError("Provide a valid link.");
    }

    const source = url.hostname.toLowerCase();
    const platform = detectPlatform(source);
    const result: MetadataResult = { source, url: link, platform };
    if (!platform) return result;

    try {
      const found =
        platform === "apple"
          ? await fetchItunesSearch(this.fetchImpl, url, this.options.timeoutMs)
          : await fetchOembed(this.fetchImpl, platform, link, this.options.timeoutMs);
      return { ...result, ...found };
    } catch (error) {
      console.warn(`[meta] ${PLATFORM_NAMES[platform]} lookup failed for ${source}:`, error);
      return result;
    }
  }
}
