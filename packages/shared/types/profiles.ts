// "w|/path/to/profile" loads every keyword of that profile as "w<keyword>"
export const PROFILE_PREFIX_SEPARATOR = "|";

export interface ProfileSpec {
  path: string;
  keywordPrefix: string;
}

export function parseProfileSpec(raw: string): ProfileSpec {
  if (raw[1] === PROFILE_PREFIX_SEPARATOR) {
    return {
      keywordPrefix: raw[0],
      path: raw.slice(2),
    };
  }
  return { keywordPrefix: "", path: raw };
}

/**
 * Splits the multi-line profile setting into specs, one per non-blank line.
 * Accepts both CRLF (what the launcher writes on Windows) and LF. Lines are
 * not trimmed: the prefix rule looks at the raw second character.
 */
export function parseProfileSpecs(raw: string): ProfileSpec[] {
  return raw
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map(parseProfileSpec);
}
