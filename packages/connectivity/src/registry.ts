/**
 * Checkers that recorded expectations but never ran a check. A test harness
 * inspects this after each test to catch a forgotten `checkConnectivity()`.
 */
export class CheckerRegistry<T extends object = object> {
  private readonly checkers = new Set<T>();

  add(checker: T): void {
    this.checkers.add(checker);
  }

  discard(checker: T): void {
    this.checkers.delete(checker);
  }

  has(checker: T): boolean {
    return this.checkers.has(checker);
  }

  get size(): number {
    return this.checkers.size;
  }

  entries(): T[] {
    return [...this.checkers];
  }

  clear(): void {
    this.checkers.clear();
  }
}

export const unactivatedCheckers = new CheckerRegistry();

/**
 * Throws if any checker recorded expectations without running them. The
 * registry is cleared either way so one leak is reported once.
 */
export function assertAllCheckersActivated(
  registry: CheckerRegistry = unactivatedCheckers,
): void {
  const leaked = registry.entries();
  registry.clear();
  if (leaked.length > 0) {
    throw new Error(
      `${leaked.length} connectivity checker(s) recorded expectations but never checked them`,
    );
  }
}
