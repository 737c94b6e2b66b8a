/**
 * Run-lifetime word rotation state.
 *
 * Records, per base tag, which words have already been emitted in the
 * current batch. A tag's record is cleared only once every word for it has
 * been used, which gives each word a turn before any repeats.
 *
 * One context belongs to one batch. Never share a context between batches
 * that run concurrently.
 */
export class GenerationContext {
  private readonly usedByTag = new Map<string, Set<string>>();

  /** Words emitted for `tag` since its last reset. */
  usedWords(tag: string): ReadonlySet<string> {
    return this.usedByTag.get(tag) ?? new Set<string>();
  }

  markUsed(tag: string, word: string): void {
    const used = this.usedByTag.get(tag);
    if (used) {
      used.add(word);
    } else {
      this.usedByTag.set(tag, new Set([word]));
    }
  }

  /** Forget the rotation history of one tag. */
  reset(tag: string): void {
    this.usedByTag.get(tag)?.clear();
  }

  /** Snapshot of the rotation state, logged at the end of a debug batch. */
  toJSON(): Record<string, string[]> {
    const snapshot: Record<string, string[]> = {};
    for (const [tag, words] of this.usedByTag) {
      snapshot[tag] = Array.from(words);
    }
    return snapshot;
  }
}
