/**
 * Jest Test Setup
 *
 * Runs before each test file: pins the environment and silences the logger.
 */

import path from 'path';

// ============================================
// Environment Configuration
// ============================================

process.env.NODE_ENV = 'test';
process.env.FMCSA_API_KEY = 'test-fmcsa-key';
process.env.FMCSA_BASE_URL = 'http://registry.test/qc/services';
process.env.FMCSA_TIMEOUT_MS = '200';
process.env.LOADS_CSV_PATH = path.join(__dirname, 'fixtures', 'loads.csv');

// ============================================
// Global Mocks
// ============================================

// Mock Winston logger
jest.mock('../utils/logger', () => {
  const logger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    http: jest.fn(),
    log: jest.fn(),
  };
  return {
    __esModule: true,
    default: logger,
    logError: jest.fn(),
    logHttp: jest.fn(),
    logRegistry: jest.fn(),
    logSecurity: jest.fn(),
    logPerformance: jest.fn(),
  };
});

beforeEach(() => {
  jest.clearAllMocks();
});
