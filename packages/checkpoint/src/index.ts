export const name = '@diffwatch/checkpoint';

export * from './types';
export * from './sqlite';
