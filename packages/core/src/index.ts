import 'reflect-metadata';

export * from './types';
export * from './errors';
export * from './logger';
export * from './utils';
export * from './migration';
export * from './issue';
export * from './atomic';
export * from './config';
export * from './repo';
export * from './lock';
export * from './git';
export * from './layout';
export * from './storage';
export * from './graph';
export * from './agent';
export * from './sync';
export * from './tracker';
export * from './doctor';
export * from './init';
export * from './container';
