/**
 * @stig-extract/contracts
 *
 * TypeScript interfaces and types for STIG rule extraction.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/diagnostic.js';
export * from './core/rule-record.js';
