export * from './agent.types';
export * from './auth.types';
export * from './client.types';
export * from './storage.types';
export * from './tool.types';
