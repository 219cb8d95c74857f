import { resolve, type Logger } from '@cartwright/shared';
import { XCConfig } from '../xcode/xcconfig';
import { CARTHAGE_DIR } from './constants';

/** Xcode major version whose simulator builds break Carthage frameworks. */
export const BROKEN_XCODE_MAJOR_VERSION = 12;

export const WORKAROUND_XCCONFIG_NAME = 'gradle-xc12-carthage.xcconfig';

const SIMULATORS = ['iphonesimulator', 'appletvsimulator'] as const;
const EXCLUDED_SIMULATOR_ARCHS = 'arm64 arm64e armv7 armv7s armv6 armv8';
const EXCLUDED_ARCHS_TEMPLATE =
  '$(inherited) $(EXCLUDED_ARCHS__EFFECTIVE_PLATFORM_SUFFIX_$(PLATFORM_NAME)__NATIVE_ARCH_64_BIT_$(NATIVE_ARCH_64_BIT)__XCODE_$(XCODE_VERSION_MAJOR))';

export interface WorkaroundOptions {
  projectRoot: string;
  xcodeMajorVersion: number;
  /** Also turn off Swift debug-option serialization in the built frameworks. */
  serializeDebugging: boolean;
}

export function workaroundConfigPath(projectRoot: string): string {
  return resolve(projectRoot, CARTHAGE_DIR, WORKAROUND_XCCONFIG_NAME);
}

/**
 * Decides which settings the Xcode 12 workaround needs. Touches no files.
 * Returns null for every other Xcode version.
 */
export function planWorkaroundConfig(options: WorkaroundOptions): XCConfig | null {
  if (options.xcodeMajorVersion !== BROKEN_XCODE_MAJOR_VERSION) {
    return null;
  }

  const config = new XCConfig(workaroundConfigPath(options.projectRoot));
  for (const simulator of SIMULATORS) {
    config.set(
      `EXCLUDED_ARCHS__EFFECTIVE_PLATFORM_SUFFIX_${simulator}__NATIVE_ARCH_64_BIT_x86_64__XCODE_1200`,
      EXCLUDED_SIMULATOR_ARCHS,
    );
  }
  config.set('EXCLUDED_ARCHS', EXCLUDED_ARCHS_TEMPLATE);

  if (options.serializeDebugging) {
    config.set('SWIFT_SERIALIZE_DEBUGGING_OPTIONS', 'NO');
    config.set('OTHER_SWIFT_FLAGS', '$(inherited) -Xfrontend -no-serialize-debugging-options');
  }
  return config;
}

/**
 * Plans the workaround config and, when one is needed, writes it to
 * `Carthage/gradle-xc12-carthage.xcconfig`.
 */
export async function createXCConfigIfNeeded(
  options: WorkaroundOptions,
  logger?: Logger,
): Promise<XCConfig | null> {
  await logger?.debug(`createXCConfigIfNeeded: ${options.xcodeMajorVersion}`);
  const config = planWorkaroundConfig(options);
  if (!config) {
    return null;
  }
  await config.create();
  await logger?.debug(`xcconfig created at ${config.file}`);
  return config;
}
