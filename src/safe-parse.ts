/**
 * Safely parse a JSON string, returning null on failure.
 * The result is unknown; callers narrow it.
 */
export function safeParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
