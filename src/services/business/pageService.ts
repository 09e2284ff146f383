/**
 * Page Service
 * Renders the form page and the metadata fragment.
 */

import { escapeHtml, PLACEHOLDER, textOrPlaceholder } from "../../utils/html.js";
import { TARGET_FORMATS } from "../../types/conversion.js";
import {
  FORMAT_OPTION_TEMPLATE,
  HOME_PAGE_TEMPLATE,
  METADATA_TEMPLATE,
  THUMBNAIL_TEMPLATE,
} from "./html/pageTemplates.js";
import { PLATFORM_NAMES, type MetadataResult } from "./metadataService.js";

/**
 * Replaces every {{KEY}} with its value. Values are inserted as-is,
 * so callers escape them first.
 */
function fill(template: string, values: Record<string, string>): string {
  return template.replace(/{{(\w+)}}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Builds the landing page with the upload/URL form and the metadata form.
 */
export function buildHomePage(): string {
  const platforms = Object.values(PLATFORM_NAMES);
  const platformList = `${platforms.slice(0, -1).join(", ")}, or ${platforms[platforms.length - 1]}`;

  const formatOptions = TARGET_FORMATS.map((format, index) =>
    fill(FORMAT_OPTION_TEMPLATE, {
      VALUE: format,
      CHECKED: index === 0 ? " checked" : "",
      LABEL: format.toUpperCase(),
    })
  ).join("\n");

  return fill(HOME_PAGE_TEMPLATE, {
    BLOCKED_PLATFORMS: escapeHtml(platformList),
    FORMAT_OPTIONS: formatOptions,
  });
}

/**
 * Builds the metadata HTML fragment. Missing fields render as a placeholder.
 */
export function buildMetadataFragment(result: MetadataResult): string {
  const thumbnail =
    result.thumbnail && /^https?:\/\//i.test(result.thumbnail)
      ? fill(THUMBNAIL_TEMPLATE, { SRC: escapeHtml(result.thumbnail) })
      : PLACEHOLDER;

  return fill(METADATA_TEMPLATE, {
    SOURCE: escapeHtml(result.source),
    URL: escapeHtml(result.url),
    TITLE: textOrPlaceholder(result.title),
    AUTHOR: textOrPlaceholder(result.author),
    THUMBNAIL: thumbnail,
  });
}
