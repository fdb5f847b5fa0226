export { runCLI, parseCliArgs, CliUsageError } from './main';
export type { CliArgs } from './main';
export { runAnalysis } from './analysis.runner';
export type { AnalysisRunConfig, AnalysisRunResult } from './analysis.runner';
export {
    TranscriptSourceError,
    readTranscriptLines,
    analyseTranscriptFile,
    analyseTranscriptFiles,
    writeAnalysisOutputs
} from './file-processor';
export type { TranscriptAnalysis } from './file-processor';
export { getDefaultOutputDir, getOutputPaths } from './output';
export type { OutputPaths } from './output';
