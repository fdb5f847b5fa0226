export * from './word-frequency';
export * from './options.resolver';
export * from './chat.aggregator';
export * from './report.builder';
export * from './transcript.analyser';
export * from './time-series.generator';
