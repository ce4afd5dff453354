export type HashMismatch = {
  /** SRI hash the build actually got. */
  hash: string;
  /** Revision of the failing fetch, when the log names one. */
  rev: string | null;
  /** Repository URL of the failing fetch, when the log names one. */
  url: string | null;
};

const GOT_HASH = /got:\s+(sha256-[\w+/=]+)/;
const UNPACKING = /unpacking source archive \/build\/([a-f0-9]+)\.tar\.gz/;
const TRYING = /trying (https:\/\/\S+)\/\+archive\/([a-f0-9]+)\.tar\.gz/g;

/**
 * Pull the "got:" hash of a fixed-output mismatch out of build output,
 * together with the revision and repository of the fetch that produced it.
 * Returns null when the output holds no hash mismatch.
 */
export function extractHashMismatch(output: string): HashMismatch | null {
  const got = GOT_HASH.exec(output);
  if (!got) return null;
  const hash = got[1];

  const trying = [...output.matchAll(TRYING)].map((m) => ({ url: m[1], rev: m[2] }));
  const unpacking = UNPACKING.exec(output);

  if (unpacking) {
    const rev = unpacking[1];
    const source = trying.find((t) => t.rev === rev);
    return { hash, rev, url: source?.url ?? null };
  }
  if (trying.length > 0) {
    return { hash, rev: trying[0].rev, url: trying[0].url };
  }
  return { hash, rev: null, url: null };
}
