export const name = '@diffwatch/cli';

export { VERSION, createProgram, run } from './program';
export * from './commands';
export * from './output/renderer';
