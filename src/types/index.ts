export * from './config';
export * from './hooks';
export * from './records';
