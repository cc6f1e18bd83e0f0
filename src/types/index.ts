/**
 * Core type definitions shared across the scan pipeline.
 */

export * from './core';
