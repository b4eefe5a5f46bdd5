/**
 * Test utilities for secp256k1-algebra
 *
 * - Property-based testing configuration and arbitraries
 * - Field element and curve point assertions
 */

// Property-based testing utilities
export * from './property-test-config.js';

// Field element and curve point assertions
export * from './field-comparison.js';
