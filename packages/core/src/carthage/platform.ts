import type { PlatformType } from '@cartwright/shared';

export type CarthagePlatformName = 'iOS' | 'Mac' | 'tvOS' | 'watchOS' | 'all';

/**
 * Maps the project's target platform to the name `carthage --platform` expects.
 * Anything unrecognised builds for every platform.
 */
export function carthagePlatformName(type: PlatformType | undefined): CarthagePlatformName {
  switch (type) {
    case 'iOS':
      return 'iOS';
    case 'tvOS':
      return 'tvOS';
    case 'macOS':
      return 'Mac';
    case 'watchOS':
      return 'watchOS';
    default:
      return 'all';
  }
}
