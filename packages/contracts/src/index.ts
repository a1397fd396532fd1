/**
 * @vies-batch/contracts
 *
 * TypeScript interfaces and types shared by the VIES batch validation packages.
 * This package has zero runtime dependencies beyond its own constants.
 *
 * @packageDocumentation
 */

// VAT queries and results
export * from './vat/query.js';
export * from './vat/result.js';

// VIES client seams
export * from './vies/client.js';
export * from './vies/log.js';
export * from './vies/cache.js';

// Batch
export * from './batch/job.js';

// Spreadsheet
export * from './spreadsheet/table.js';
