/**
 * Export Module
 */

export { writeReviewsCsv, toCsv, escapeCsvValue, defaultOutputPath, CSV_COLUMNS } from './csv-writer.js';
export { computeStatistics } from './statistics.js';
