/**
 * @pgrotate/core
 *
 * Shared configuration, logging and error types for pgrotate.
 *
 * This package provides:
 * - Configuration loading and validation
 * - Structured logging with Winston
 * - The rotation error taxonomy
 */

// Re-export config module
export * from './config/index.js';

// Re-export logger module
export * from './logger/index.js';

// Re-export error types
export * from './errors/index.js';
