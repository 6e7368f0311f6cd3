/**
 * Line format of the fingerprint store: one `relative_path=fingerprint`
 * record per line. Only the first `=` splits, so paths containing `=` do not
 * round-trip.
 */

export type FingerprintMap = Map<string, string>;

/**
 * Parses store contents. Lines without `=` are skipped so hand-edited files
 * keep loading; a repeated path keeps its last value.
 */
export function parseFingerprints(text: string): FingerprintMap {
  const result: FingerprintMap = new Map();
  for (const rawLine of text.split('\n')) {
    if (!rawLine.includes('=')) continue;
    const line = rawLine.trim();
    const separator = line.indexOf('=');
    result.set(line.slice(0, separator), line.slice(separator + 1));
  }
  return result;
}

export function serializeFingerprints(fingerprints: FingerprintMap): string {
  let out = '';
  for (const [filePath, fingerprint] of fingerprints) {
    out += `${filePath}=${fingerprint}\n`;
  }
  return out;
}
