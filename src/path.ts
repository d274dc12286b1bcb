/**
 * Path types and utilities.
 *
 * A path is the list of segments walked from a version root down to a
 * node of the endpoint tree. Each segment is either a static name
 * (string) or a captured parameter ([keyword, value]).
 */

export type PathValue = string | number | bigint | boolean;

export type PathSegment = string | [keyword: string, value: PathValue];
export type PathSegments = PathSegment[];

/** The text a segment contributes to the URL. */
export function segmentText(seg: PathSegment): string {
  return typeof seg === "string" ? seg : String(seg[1]);
}

/** Join segments with "/", skipping empty ones (version-less roots). */
export function joinPath(path: readonly PathSegment[]): string {
  const parts: string[] = [];
  for (const seg of path) {
    const text = segmentText(seg);
    if (text !== "") parts.push(text);
  }
  return parts.join("/");
}
