/**
 * names.ts - Collection name normalization
 *
 * Weaviate class names must start with an uppercase letter and contain only
 * letters, digits and underscores. Callers use free-form names ("Board
 * Minutes 2024"), so every public operation maps them to a storage name
 * first. The mapping is deterministic and idempotent: sanitizing a
 * sanitized name returns it unchanged.
 */

export const MAX_NAME_LENGTH = 128;
const FALLBACK_NAME = "Collection";

/**
 * "Board Minutes 2024" -> "BoardMinutes2024", "2024 notes" -> "C2024Notes".
 *
 * Splits on runs of non-alphanumerics, uppercases the first letter of each
 * part, joins them, prefixes "C" when the result does not start with a
 * letter, and truncates to MAX_NAME_LENGTH.
 */
export function sanitizeCollectionName(name: string): string {
  const joined = name
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");

  let result = joined.length > 0 ? joined : FALLBACK_NAME;
  if (!/^[A-Za-z]/.test(result)) {
    result = `C${result}`;
  }
  return result.slice(0, MAX_NAME_LENGTH);
}

/**
 * Remembers which caller names mapped to which storage names so listings
 * can be shown in the caller's terms.
 */
export class NameRegistry {
  private readonly toStorage = new Map<string, string>();
  private readonly toCaller = new Map<string, string>();

  resolve(callerName: string): string {
    const cached = this.toStorage.get(callerName);
    if (cached) return cached;

    const storageName = sanitizeCollectionName(callerName);
    this.toStorage.set(callerName, storageName);
    if (!this.toCaller.has(storageName)) {
      this.toCaller.set(storageName, callerName);
    }
    return storageName;
  }

  /** First caller name seen for a storage name, or the storage name itself. */
  callerNameFor(storageName: string): string {
    return this.toCaller.get(storageName) ?? storageName;
  }
}
