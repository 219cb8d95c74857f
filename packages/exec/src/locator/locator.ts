import { ToolNotFoundError, type Logger } from '@cartwright/shared';
import { DEFAULT_STRATEGIES, type LocatorStrategy } from './strategies';

export interface ExecutableLocatorOptions {
  /** Tried in order; the first path found wins. */
  strategies?: readonly LocatorStrategy[];
  /** Product name used in the not-found message, e.g. `Carthage`. */
  displayName?: string;
  logger?: Logger;
}

/**
 * Finds an executable by trying each strategy in turn. A found path is
 * cached for the life of the locator.
 */
export class ExecutableLocator {
  private readonly strategies: readonly LocatorStrategy[];
  private readonly displayName: string;
  private cached: string | undefined;

  constructor(
    private readonly tool: string,
    private readonly options: ExecutableLocatorOptions = {},
  ) {
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
    this.displayName = options.displayName ?? tool;
  }

  async locate(): Promise<string> {
    if (this.cached !== undefined) {
      return this.cached;
    }

    for (const strategy of this.strategies) {
      const found = await strategy.resolve(this.tool);
      if (found) {
        await this.options.logger?.debug(`Found ${this.tool} via ${strategy.name}: ${found}`);
        this.cached = found;
        return found;
      }
      await this.options.logger?.debug(`${this.tool} not found via ${strategy.name}`);
    }

    throw new ToolNotFoundError(
      this.tool,
      `The ${this.tool} command was not found. Make sure that ${this.displayName} is installed`,
      { details: { searched: this.strategies.map((s) => s.name) } },
    );
  }
}
