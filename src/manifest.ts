/**
 * Release sources for the index builder.
 *
 * Two ways to list the archives python-build-standalone publishes:
 * the gzipped manifest.json from the repository, or the HTML assets
 * page of a GitHub release parsed with jsdom.
 */

import { gunzipSync } from "node:zlib";
import { JSDOM } from "jsdom";
import type { IndexSource, Manifest, ManifestEntry } from "./types.js";
import { assertManifest, fetchWithRetry, type RetryOptions } from "./utils.js";

export const MANIFEST_URL =
  "https://raw.githubusercontent.com/astral-sh/python-build-standalone/main/manifest.json.gz";

export const RELEASE_ASSETS_URL =
  "https://github.com/astral-sh/python-build-standalone/releases/expanded_assets/latest";

export const USER_AGENT = "cpython-build-index/0.3";

/** Archive extensions picked up from release pages */
const ARCHIVE_SUFFIXES = [".tar.gz", ".tar.zst"];

/**
 * Whether a buffer starts with the gzip magic bytes (1f 8b).
 */
export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/**
 * Decode a manifest body, gunzipping it first when it is gzip data.
 *
 * @throws {Error} If the body is not JSON or not a manifest
 */
export function parseManifest(data: Uint8Array): Manifest {
  const raw = isGzip(data) ? gunzipSync(data) : Buffer.from(data);
  const parsed: unknown = JSON.parse(raw.toString("utf-8"));
  assertManifest(parsed);
  return parsed;
}

/**
 * Download and decode manifest.json(.gz).
 */
export async function fetchManifest(url: string = MANIFEST_URL, retry: RetryOptions = {}): Promise<Manifest> {
  const response = await fetchWithRetry(url, {
    ...retry,
    headers: { "User-Agent": USER_AGENT, "Accept-Encoding": "gzip" },
  });
  const data = new Uint8Array(await response.arrayBuffer());
  return parseManifest(data);
}

/**
 * Extract archive links from a release assets page.
 * Hrefs are resolved against the page URL; repeated URLs are kept once.
 *
 * @param html - Page markup
 * @param pageUrl - URL the page was loaded from
 */
export function extractReleaseAssets(html: string, pageUrl: string): ManifestEntry[] {
  const { document } = new JSDOM(html).window;
  const seen = new Set<string>();
  const entries: ManifestEntry[] = [];

  for (const anchor of Array.from(document.querySelectorAll("a[href]"))) {
    const href = anchor.getAttribute("href");
    if (!href) continue;

    let url: URL;
    let filename: string;
    try {
      url = new URL(href, pageUrl);
      filename = decodeURIComponent(url.pathname.split("/").pop() ?? "");
    } catch {
      // Unparseable href or malformed escape; not an archive link
      continue;
    }
    if (!ARCHIVE_SUFFIXES.some((suffix) => filename.endsWith(suffix))) continue;

    const downloadUrl = url.toString();
    if (seen.has(downloadUrl)) continue;
    seen.add(downloadUrl);

    entries.push({ filename, download_url: downloadUrl });
  }

  return entries;
}

/**
 * Download a release assets page and list its archives.
 */
export async function fetchReleaseAssets(
  url: string = RELEASE_ASSETS_URL,
  retry: RetryOptions = {},
): Promise<ManifestEntry[]> {
  const response = await fetchWithRetry(url, {
    ...retry,
    headers: { "User-Agent": USER_AGENT, Accept: "text/html" },
  });
  return extractReleaseAssets(await response.text(), url);
}

/**
 * List archives from the chosen source.
 *
 * @param url - Overrides the source's default URL
 */
export async function loadEntries(
  source: IndexSource,
  url: string | null = null,
  retry: RetryOptions = {},
): Promise<ManifestEntry[]> {
  if (source === "html") {
    return fetchReleaseAssets(url ?? RELEASE_ASSETS_URL, retry);
  }
  const manifest = await fetchManifest(url ?? MANIFEST_URL, retry);
  return manifest.files;
}
