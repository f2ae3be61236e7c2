// CHANGE: URL helpers for GitHub REST paths and pagination headers.
// WHY: Owner and repository names are interpolated into paths; listings continue through `Link: rel="next"`.

/**
 * Join path segments with each segment URL-encoded.
 *
 * @param segments - Raw path parts such as an owner or repository name.
 * @returns Absolute path starting with "/".
 */
export function repoPath(...segments: readonly string[]): string {
  return `/${segments.map(segment => encodeURIComponent(segment)).join("/")}`;
}

/**
 * Extract the `rel="next"` target from a `Link` header.
 *
 * @param header - Raw header value, possibly undefined.
 * @returns Next page URL, or undefined on the last page.
 */
export function nextPageUrl(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="([^"]+)"/.exec(part.trim());
    if (match && match[2].split(/\s+/).includes("next")) {
      return match[1];
    }
  }
  return undefined;
}
