export * from './protocol/constants';
export * from './protocol/errors';
export * from './protocol/frame';
export * from './protocol/commands';
export * from './protocol/capabilities';
export * from './core/types';
export * from './core/connection';
export * from './core/limited-control';
export * from './core/state';
export * from './core/dispatcher';
export * from './core/ReceiverController';
export * from './config';
export * from './logger';
