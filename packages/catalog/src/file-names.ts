/**
 * File and directory names for tenant and connector IDs.
 *
 * The encoding is one-to-one, so distinct IDs never share a file, and the
 * result contains no path separators or dot segments.
 */
export function encodeFileName(id: string): string {
  return encodeURIComponent(id).replace(/\./g, '%2E').replace(/[!'()*]/g, (c) =>
    `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}
