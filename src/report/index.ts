export * from './format.utils';
export * from './text-report.renderer';
