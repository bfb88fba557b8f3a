export * from './errors';
export * from './file-size';
export * from './file-name';
