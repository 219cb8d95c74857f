export * from './output/appender';
export * from './runner/runner';
export * from './locator/strategies';
export * from './locator/locator';
