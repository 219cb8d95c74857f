export const name = '@cartwright/core';

export * from './carthage/constants';
export * from './carthage/platform';
export * from './carthage/workaround';
export * from './carthage/environment';
export * from './carthage/manifest';
export * from './carthage/task';
export * from './carthage/tasks';
export * from './carthage/factory';
export * from './xcode/xcconfig';
export * from './xcode/toolchain';
export * from './config/loader';
