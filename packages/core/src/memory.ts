/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for testing.
 */

export { MemoryConfigStore } from './config_store/memory';
