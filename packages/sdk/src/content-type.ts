/**
 * Codec utilities for content-type strings
 * Provides matching, simplification and translation-key derivation
 *
 * Media types are case-insensitive but are presented case-preserved in the
 * registry data, so every comparison key is derived from the lowercase form.
 */

const MEDIA_TYPE_RE = /^([a-z][-\w.+]*)\/([a-z0-9][-\w.+]*)$/i;
const I18N_RE = /[^a-z0-9]/g;
const X_PREFIX_RE = /^x-/;

/**
 * The two halves of a content type, case preserved
 */
export interface ContentTypeParts {
  mediaType: string;
  subType: string;
}

export interface SimplifyOptions {
  /** Strip a leading `x-` from both halves (default: false) */
  removeXPrefix?: boolean;
}

/**
 * Split a content type into its media type and sub type
 * @param contentType - Candidate `media/subtype` string
 * @returns The raw captures, or undefined if the string is not a content type
 *
 * @example
 * matchContentType("text/x-Plain") // => { mediaType: "text", subType: "x-Plain" }
 * matchContentType("text/_plain")  // => undefined
 */
export function matchContentType(contentType: string): ContentTypeParts | undefined {
  const match = MEDIA_TYPE_RE.exec(contentType);
  if (!match) {
    return undefined;
  }

  const [, mediaType = "", subType = ""] = match;
  return { mediaType, subType };
}

/**
 * Check whether a string is a valid `media/subtype` content type
 */
export function isContentType(value: string): boolean {
  return MEDIA_TYPE_RE.test(value);
}

/**
 * Lowercase form of a content type, used as the registry key
 *
 * `x-` markers are kept unless `removeXPrefix` is set.
 *
 * @example
 * simplify("text/Plain")                            // => "text/plain"
 * simplify("text/x-Plain")                          // => "text/x-plain"
 * simplify("text/x-Plain", { removeXPrefix: true }) // => "text/plain"
 * simplify("text/_plain")                           // => undefined
 */
export function simplify(contentType: string, options: SimplifyOptions = {}): string | undefined {
  const parts = matchContentType(contentType);
  if (!parts) {
    return undefined;
  }

  const halves = [parts.mediaType, parts.subType].map((half) => {
    const lower = half.toLowerCase();
    return options.removeXPrefix ? lower.replace(X_PREFIX_RE, "") : lower;
  });

  return halves.join("/");
}

/**
 * Translation key for a content type
 *
 * @example
 * i18nKey("text/Plain")                   // => "text.plain"
 * i18nKey("application/vnd.3gpp.bsf+xml") // => "application.vnd-3gpp-bsf-xml"
 */
export function i18nKey(contentType: string): string | undefined {
  const parts = matchContentType(contentType);
  return parts ? toI18nKey(parts) : undefined;
}

/**
 * Translation key for already matched content-type halves
 */
export function toI18nKey(parts: ContentTypeParts): string {
  return [parts.mediaType, parts.subType]
    .map((half) => half.toLowerCase().replace(I18N_RE, "-"))
    .join(".");
}
