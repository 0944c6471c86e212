export * from './configuration.error';
export * from './invalid-context-value';
