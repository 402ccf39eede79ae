export * from './types/annotations';
export * from './types/batch';
export * from './errors';
export * from './classTable';
export * from './geometry';
export * from './records';
