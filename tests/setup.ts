/**
 * Vitest setup file. Runs before every test file.
 */

// tsyringe refuses to load without a Reflect polyfill
import 'reflect-metadata';

// NOTE: Do not register process-level signal or exit handlers in tests.
// Vitest owns the process lifecycle.
