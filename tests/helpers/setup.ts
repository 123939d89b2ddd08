/**
 * Vitest Global Setup
 * This file runs before all tests
 */

import { config } from 'dotenv';
import { afterEach, vi } from 'vitest';

import { configureLogging } from '@/lib/logger.js';

// Load test environment variables (optional - won't fail if not present)
config({ path: '.env.test' });

// Log output only when a test run asks for it
configureLogging({ disabled: process.env.DISABLE_LOG !== 'false' });

afterEach(() => {
  vi.useRealTimers();
});
