/**
 * Paths confirmed (or just rewritten) during the validation phase of one
 * rescan. Discovery skips anything in here, so a file is never both
 * "known" and "new" within the same pass.
 */
export class VisitedSet implements Iterable<string> {
  private readonly paths = new Set<string>();

  mark(path: string): void {
    this.paths.add(path);
  }

  has(path: string): boolean {
    return this.paths.has(path);
  }

  get size(): number {
    return this.paths.size;
  }

  clear(): void {
    this.paths.clear();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.paths.values();
  }
}
