/**
 * Denials Summarizer Module
 */

export { DenialsSummarizer } from './summarizer';
export * from './interfaces';
