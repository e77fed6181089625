export const name = '@diffwatch/notify';

export * from './render';
export * from './transport';
export * from './mailer';
