import { atomicWrite } from '@cartwright/shared';

/**
 * An Xcode build-settings file: ordered `KEY = VALUE` lines.
 * Setting an existing key replaces its value in place.
 */
export class XCConfig {
  private readonly values = new Map<string, string>();

  constructor(readonly file: string) {}

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  get entries(): ReadonlyMap<string, string> {
    return this.values;
  }

  get size(): number {
    return this.values.size;
  }

  toString(): string {
    let text = '';
    for (const [key, value] of this.values) {
      text += `${key} = ${value}\n`;
    }
    return text;
  }

  /**
   * Writes the file, replacing any previous content.
   */
  async create(): Promise<void> {
    await atomicWrite(this.file, this.toString());
  }
}
