/**
 * Analyzer version, reported by the CLI
 */

export const VERSION = '1.0.0';
