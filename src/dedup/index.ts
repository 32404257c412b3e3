/**
 * Two-generation set of Message-IDs. `current` collects identifiers handled
 * during this wake-up, `previous` holds those of the wake-up before it.
 */
export class DedupWindow {
  private previous = new Set<string>();
  private current = new Set<string>();

  /** Start of a wake-up: the current generation becomes the previous one. */
  rotate(): void {
    this.previous = this.current;
    this.current = new Set();
  }

  /** Working set for one rule's pipeline: `current ∪ previous`. */
  beginRule(): Set<string> {
    return new Set([...this.current, ...this.previous]);
  }

  /** Keep only what is new in this wake-up: `seen \ previous`. */
  endRule(seen: ReadonlySet<string>): void {
    const next = new Set<string>();
    for (const id of seen) {
      if (!this.previous.has(id)) next.add(id);
    }
    this.current = next;
  }

  has(id: string): boolean {
    return this.current.has(id) || this.previous.has(id);
  }

  snapshot(): { previous: string[]; current: string[] } {
    return { previous: [...this.previous], current: [...this.current] };
  }
}

/**
 * Claim an identifier for processing. Returns false when it was already
 * handled; otherwise records it in `seen`, before any side effect runs.
 */
export function claimMessage(messageId: string, seen: Set<string>): boolean {
  if (seen.has(messageId)) return false;
  seen.add(messageId);
  return true;
}
