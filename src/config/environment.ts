/**
 * Environment Configuration Management
 * Maps the deployment environment onto logging behaviour
 */

export type Environment = 'development' | 'test' | 'production';

export interface EnvironmentConfig {
  env: Environment;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    structured: boolean;
  };
}

/**
 * Detect current environment from NODE_ENV; an installed CLI runs without it,
 * so unset means production
 */
export function getEnvironment(): Environment {
  const nodeEnv = process.env.NODE_ENV?.toLowerCase();

  switch (nodeEnv) {
    case 'development':
    case 'dev':
      return 'development';
    case 'test':
      return 'test';
    case 'production':
    case 'prod':
    default:
      return 'production';
  }
}

/**
 * Get environment-specific configuration
 */
export function getEnvironmentConfig(): EnvironmentConfig {
  const env = getEnvironment();
  const debugOn = process.env.NBACK_DEBUG === 'true';

  let level: EnvironmentConfig['logging']['level'];
  if (debugOn) {
    level = 'debug';
  } else if (env === 'production') {
    level = 'info';
  } else if (env === 'test') {
    // keep jest output readable
    level = 'error';
  } else {
    level = 'debug';
  }

  return {
    env,
    isDevelopment: env === 'development',
    isProduction: env === 'production',
    isTest: env === 'test',
    logging: {
      level,
      structured: env === 'production'
    }
  };
}
