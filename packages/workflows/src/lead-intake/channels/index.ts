export * from './types';
export * from './slack-webhook';
export * from './email';
