import scale from "../config/scale";

const THUMB_SEGMENT = "thumb/";
const SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Rewrites a category thumbnail reference into the URL of its full-size original.
 *
 * Thumbnails live at `<base>/thumb/<hash>/<File.ext>/<size>-<File.ext>`; dropping the
 * `thumb/` segment and everything after `<File.ext>` yields the original file.
 * Returns `null` when the reference is not an absolute http(s) URL or carries no
 * recognized extension followed by a path separator.
 */
export function normalizeImageLink(rawLink: string): string | null {
  const candidate = rawLink.replace(THUMB_SEGMENT, "");
  if (!SCHEME_PATTERN.test(candidate)) return null;

  for (const extension of scale.images.extensions) {
    const index = candidate.indexOf(extension);
    if (index === -1 || index >= candidate.length - scale.images.minTailLength) continue;

    const cut = candidate.indexOf("/", index + extension.length);
    if (cut === -1) return null;

    return candidate.slice(0, cut);
  }

  return null;
}

export function normalizeImageLinks(rawLinks: readonly string[]): string[] {
  return rawLinks.flatMap((rawLink) => {
    const url = normalizeImageLink(rawLink);
    return url === null ? [] : [url];
  });
}
