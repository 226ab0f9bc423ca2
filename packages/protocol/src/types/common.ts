// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque unique identifier
 */
export type Id = string;

/**
 * A plain, JSON-like mapping of string keys to arbitrary values.
 * This is the export format of a field store.
 */
export type PlainMapping = Record<string, unknown>;
