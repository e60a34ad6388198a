import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

// Environment type
type Environment = 'development' | 'production' | 'test';

const parseEnvironment = (value: string | undefined): Environment =>
  value === 'production' || value === 'test' ? value : 'development';

const nodeEnv = parseEnvironment(process.env.NODE_ENV);
const isProduction = nodeEnv === 'production';
const isDevelopment = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

const corsOrigins: string[] = process.env.CORS_ORIGINS?.split(',') || [
  'http://localhost:5173',
  'http://localhost:3000',
];

export const config = {
  // Server
  port: parseInt(process.env.PORT || '8000', 10),
  nodeEnv,
  isProduction,
  isDevelopment,
  isTest,

  // Load dataset (CSV, read once at startup)
  dataset: {
    path: process.env.LOADS_CSV_PATH || path.resolve(__dirname, '../../data/loads.csv'),
  },

  // FMCSA QCMobile registry
  fmcsa: {
    apiKey: process.env.FMCSA_API_KEY || '',
    baseUrl: process.env.FMCSA_BASE_URL || 'https://mobile.fmcsa.dot.gov/qc/services',
    timeoutMs: parseInt(process.env.FMCSA_TIMEOUT_MS || '5000', 10),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '300', 10),
  },

  // Cors
  cors: {
    origins: corsOrigins,
    credentials: true,
  },
} as const;

// Configuration validation errors
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Validate required configuration
export function validateConfig(): void {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isFinite(config.fmcsa.timeoutMs) || config.fmcsa.timeoutMs <= 0) {
    errors.push('FMCSA_TIMEOUT_MS must be a positive number of milliseconds');
  }

  if (!Number.isFinite(config.port) || config.port <= 0) {
    errors.push('PORT must be a positive number');
  }

  if (!Number.isFinite(config.rateLimit.windowMs) || config.rateLimit.windowMs <= 0) {
    errors.push('RATE_LIMIT_WINDOW_MS must be a positive number of milliseconds');
  }

  if (!Number.isFinite(config.rateLimit.maxRequests) || config.rateLimit.maxRequests <= 0) {
    errors.push('RATE_LIMIT_MAX_REQUESTS must be a positive number');
  }

  // ============================================
  // Production-only required variables
  // ============================================
  if (isProduction) {
    if (!process.env.FMCSA_API_KEY) {
      errors.push('FMCSA_API_KEY is required in production');
    }

    if (!process.env.CORS_ORIGINS) {
      warnings.push('CORS_ORIGINS not set - using default localhost origins');
    }
  } else if (!process.env.FMCSA_API_KEY) {
    warnings.push('FMCSA_API_KEY not set - carrier validation will report the registry as not configured');
  }

  if (!process.env.LOADS_CSV_PATH) {
    warnings.push(`LOADS_CSV_PATH not set - using ${config.dataset.path}`);
  }

  // ============================================
  // Log warnings
  // ============================================
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach((warning) => console.warn(`   - ${warning}`));
    console.warn('');
  }

  // ============================================
  // Throw on errors
  // ============================================
  if (errors.length > 0) {
    console.error('\n❌ Configuration Errors:');
    errors.forEach((error) => console.error(`   - ${error}`));
    console.error('');

    throw new ConfigurationError(
      `Invalid configuration for ${nodeEnv} environment:\n${errors.join('\n')}`
    );
  }

  console.log(`✅ Configuration validated for ${nodeEnv} environment`);
}

// Get public-safe config (no secrets)
export function getPublicConfig() {
  return {
    nodeEnv: config.nodeEnv,
    features: {
      fmcsa: !!config.fmcsa.apiKey,
    },
    registry: {
      baseUrl: config.fmcsa.baseUrl,
      timeoutMs: config.fmcsa.timeoutMs,
    },
  };
}

export default config;
