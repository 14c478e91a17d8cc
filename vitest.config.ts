/**
 * Vitest Configuration
 *
 * Tests live under tests/ and mirror the src/ layout.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
