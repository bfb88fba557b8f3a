// Shared schemas, policy and encoding for the media probe

export * from './enums';
export * from './schema';
export * from './utils';

export * from './policy/classifier';
export * from './codec/payload-codec';
export * from './timeline/probe-timeline';
export * from './report/report-table';
