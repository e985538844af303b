/**
 * Run-scoped key/value space shared by every node of a run.
 *
 * Values are only ever set or overwritten. Each applied patch bumps `version`,
 * including an empty one.
 */
export class ContextStore {
  private readonly values = new Map<string, unknown>();
  private currentVersion: number;

  constructor(initial: Readonly<Record<string, unknown>> = {}, version = 0) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
    this.currentVersion = version;
  }

  get version(): number {
    return this.currentVersion;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  apply(patch: Readonly<Record<string, unknown>>): number {
    for (const [key, value] of Object.entries(patch)) {
      this.values.set(key, value);
    }
    this.currentVersion += 1;
    return this.currentVersion;
  }

  pick(keys: readonly string[]): Record<string, unknown> {
    const picked: Record<string, unknown> = {};
    for (const key of keys) {
      if (this.values.has(key)) {
        picked[key] = this.values.get(key);
      }
    }
    return picked;
  }

  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
