export * from './state';
export * from './pipeline';
export * from './factory';
