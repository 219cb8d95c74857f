import which from 'which';
import { fileExists, join } from '@cartwright/shared';

/**
 * One way of finding an executable. Resolves to its path, or null when this
 * strategy cannot find it.
 */
export interface LocatorStrategy {
  readonly name: string;
  resolve(tool: string): Promise<string | null>;
}

/**
 * Looks the tool up on PATH, like `which <tool>`.
 */
export const searchPathStrategy: LocatorStrategy = {
  name: 'search-path',
  async resolve(tool: string): Promise<string | null> {
    return which(tool, { nothrow: true });
  },
};

/**
 * Checks for `<dir>/<tool>` on disk.
 */
export function fixedPathStrategy(dir = '/usr/local/bin'): LocatorStrategy {
  return {
    name: `fixed-path:${dir}`,
    async resolve(tool: string): Promise<string | null> {
      const candidate = join(dir, tool);
      return (await fileExists(candidate)) ? candidate : null;
    },
  };
}

export const DEFAULT_STRATEGIES: readonly LocatorStrategy[] = [
  searchPathStrategy,
  fixedPathStrategy(),
];
