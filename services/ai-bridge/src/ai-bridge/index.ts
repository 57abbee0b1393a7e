export * from './types';
export * from './ai-response';
export * from './ai-bridge.service';
export * from './ai-bridge.module';
export * from './adapters';
