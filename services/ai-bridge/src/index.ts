import 'reflect-metadata';

export * from './ai-bridge';
export * from './config/ai-bridge.config';
export * from './config/env.validation';
export * from './config/log-level';
export * from './errors';
