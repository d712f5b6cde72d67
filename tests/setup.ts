/**
 * Test setup
 */

import { LogLevel, setGlobalLogLevel } from '../src/core/logger';

// Quiet every logger; tests that care about logging raise the level themselves
setGlobalLogLevel(LogLevel.SILENT);
