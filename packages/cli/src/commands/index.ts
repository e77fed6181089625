export * from './types';
export * from './scan';
export * from './history';
