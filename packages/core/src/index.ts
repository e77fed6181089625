export const name = '@diffwatch/core';

export * from './config/loader';
export * from './prompt/builder';
export * from './pipeline';
