export const name = '@diffwatch/adapters';

export * from './types';
export * from './adapter';

export * from './openai';
export * from './fake/adapter';
