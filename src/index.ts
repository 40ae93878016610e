export * from './crypto';
export * from './dtls';
export * from './config';
export * from './logging';
