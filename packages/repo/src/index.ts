export const name = '@diffwatch/repo';

export * from './git';
export * from './mirror';
export * from './harvest';
