export * from './file-record';
export * from './result-batch';
export * from './bridge-message';
