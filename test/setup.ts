/**
 * Test Setup
 * Global test configuration and utilities
 */

import { pino } from 'pino';
import { setLogger } from '../src/core/logger.js';

// Keep log files out of the user's home directory during tests
setLogger(pino({ level: 'silent' }));
