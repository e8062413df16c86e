/**
 * Shared conformance generators for @gridmat/core
 *
 * Each generator registers a suite against any framework that provides
 * describe/it/expect, once per execution configuration.
 */

export * from './generators';
