export interface Citation {
  tag: string;
  url: string;
}

/**
 * Numbered citation tags ("web:1", "web:2", ...) in first-seen order. Adding
 * the same URL twice returns its original tag.
 */
export class CitationRegistry {
  private readonly tags = new Map<string, string>();

  add(url: string): string {
    const existing = this.tags.get(url);
    if (existing) return existing;
    const tag = `web:${this.tags.size + 1}`;
    this.tags.set(url, tag);
    return tag;
  }

  inline(url: string): string {
    return `[${this.add(url)}]`;
  }

  render(): Citation[] {
    return Array.from(this.tags, ([url, tag]) => ({ tag, url }));
  }

  get size(): number {
    return this.tags.size;
  }
}
