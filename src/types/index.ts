/**
 * Core types for bio-extract
 */

export * from './biography.js';
