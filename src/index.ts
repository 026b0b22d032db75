/**
 * modelver
 *
 * Semantic versioning for machine learning model directories.
 * Synchronous, dependency-injected, testable against an in-memory filesystem.
 */

// Core interfaces (filesystem port and its Node.js implementation)
export * from '#/core';

// Constants
export * from '#/constants';

// Errors
export * from '#/errors';

// Logging (pino)
export * from '#/logger';

// Schemas (Zod validation)
export * from '#/schemas';

// Friendly errors (YAML + Zod)
export * from '#/friendly-errors';

// Version value type (parse, format, compare, bump)
export * from '#/version';

// Version handler (history of one model directory)
export * from '#/versionHandler';

// Artifacts (payload files per version)
export * from '#/artifacts';

// Project configuration (modelver.yaml)
export * from '#/config';

// Formatters (pure utilities)
export * from '#/formatters';
