/** Memoizes one value for the lifetime of a Repository instance. */
export class ValueCache<T> {
  private loaded = false;
  private storedValue: T | undefined;

  set(value: T): void {
    this.storedValue = value;
    this.loaded = true;
  }

  invalidate(): void {
    this.storedValue = undefined;
    this.loaded = false;
  }

  async getOrLoad(load: () => Promise<T>): Promise<T> {
    if (this.loaded && this.storedValue !== undefined) {
      return this.storedValue;
    }
    const value = await load();
    this.set(value);
    return value;
  }
}
