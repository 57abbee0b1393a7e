export * from './configuration.error';
export * from './invalid-argument.error';
