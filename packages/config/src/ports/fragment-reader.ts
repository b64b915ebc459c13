/**
 * Reads configuration fragments.
 *
 * A FragmentReader only locates and reads text; parsing, include handling and
 * merging happen in the loader.
 */
export interface FragmentReader {
  /**
   * Human-readable name for diagnostics.
   * Example: "fs:/srv/pipeline", "memory"
   */
  readonly name: string

  /**
   * Canonical identity of `ref`, resolved against the fragment that includes
   * it (or against the reader's base when `from` is omitted).
   *
   * Two refs naming the same fragment must resolve to the same identity, since
   * identities drive cycle detection and provenance.
   */
  resolve(ref: string, from?: string): string

  /**
   * Fragment text, or `undefined` when nothing exists at `id`.
   *
   * Any other failure (permissions, I/O) rejects.
   */
  read(id: string): Promise<string | undefined>
}
