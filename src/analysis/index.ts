/**
 * Issue Detector
 */

export * from './types.js';
export { IssueDetector, type IssueDetectorOptions, calculateMetrics, INDEX_LOOP } from './IssueDetector.js';
export { parseSource, checkParses, isSourceFile, parserPluginsFor, type ParseCheck } from './sourceParser.js';
