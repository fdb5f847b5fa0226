export * from './line.classifier';
export * from './system-notice.filter';
export * from './transcript.parser';
