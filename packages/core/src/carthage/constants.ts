export const ACTION_BOOTSTRAP = 'bootstrap';
export const ACTION_UPDATE = 'update';
export const ACTION_BUILD = 'build';

export type CarthageAction = typeof ACTION_BOOTSTRAP | typeof ACTION_UPDATE | typeof ACTION_BUILD;

export const ARGUMENT_ARCHIVE = '--archive';
export const ARGUMENT_CACHE_BUILDS = '--cache-builds';
export const ARGUMENT_PLATFORM = '--platform';
export const ARGUMENT_DERIVED_DATA = '--derived-data';

export const CARTHAGE_FILE = 'Cartfile';
export const CARTHAGE_FILE_RESOLVED = 'Cartfile.resolved';
export const CARTHAGE_DIR = 'Carthage';
export const CARTHAGE_DERIVED_DATA_DIR = 'carthage';

export const CARTHAGE_DISPLAY_NAME = 'Carthage';

export const XCCONFIG_ENV_KEY = 'XCODE_XCCONFIG_FILE';
