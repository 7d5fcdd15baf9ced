/**
 * @specwire/core - protocol building blocks
 *
 * Everything here is transport-agnostic: the binary message codec, the frame
 * decoder that reassembles split reads, value coercion between wire payloads
 * and typed values, the error taxonomy and the structured logger shared by
 * the client.
 *
 * @packageDocumentation
 * @module @specwire/core
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Protocol
export * from './protocol/index.js';
