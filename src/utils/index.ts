export * from './constants';
export * from './date.utils';
export * from './file.utils';
export * from './text.utils';
