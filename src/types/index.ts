export * from './message.types';
export * from './options.types';
export * from './report.types';
export * from './analysis.types';
