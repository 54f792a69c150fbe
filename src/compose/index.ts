/**
 * @fileoverview Barrel file for the compose module: parsing, validation, inspection,
 * serialization and generation of compose topologies.
 */

export * from './dependency-graph.js';
export * from './duration.js';
export * from './env-file.js';
export * from './generator.js';
export * from './healthcheck.js';
export * from './inspector.js';
export * from './interpolation.js';
export * from './loader.js';
export * from './parser.js';
export * from './ports.js';
export * from './schema.js';
export * from './serializer.js';
export * from './validator.js';
export * from './volumes.js';
