import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes.
 * Xcode and Carthage only run on macOS, but config paths may be authored on Windows.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.resolve`.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * Checks if the current host is macOS, the only platform Xcode runs on.
 */
export function isMacOS(): boolean {
  return os.platform() === 'darwin';
}
