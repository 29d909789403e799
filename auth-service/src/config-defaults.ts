/**
 * Auth Service Configuration Defaults
 *
 * Baseline for every setting. Config files and AUTH_SERVICE_* environment
 * variables are merged over these values (see loadAuthConfig). Sensitive
 * paths are masked when the effective configuration is logged.
 */

export const AUTH_CONFIG_DEFAULTS = {
  serviceName: { value: 'auth-service', description: 'Service name' },

  // Session Configuration
  sessionLifetimeMs: {
    value: 2 * 60 * 60 * 1000,
    description: 'Absolute session lifetime in milliseconds (2 h)',
  },

  sessionRefreshMs: {
    value: 0,
    description: 'Rotate the session token when at most this much lifetime remains; 0 disables rotation',
  },

  maxLoginAttempts: {
    value: 5,
    description: 'Consecutive failed logins before the account is locked',
  },

  // Activation Configuration
  activationWindowMs: {
    value: 24 * 60 * 60 * 1000,
    description: 'Lifetime of activation links in milliseconds (24 h)',
  },

  // Password Policy
  bcryptRounds: {
    value: 12,
    description: 'bcrypt cost factor',
  },

  // Roles
  defaultRoleId: {
    value: 'standard',
    description: 'Role assigned to newly registered users',
  },

  anonymousRoleId: {
    value: 'anonymous',
    description: 'Role used to authorize requests without a session',
  },

  accessModelFile: {
    value: '',
    description: 'JSON file with the roles and permissions to seed (empty: bundled config/access-model.json)',
  },

  // URLs Configuration
  baseUrl: {
    value: 'http://localhost:3000',
    description: 'Front-end URL that receives activation links',
  },

  // Database
  mongoUri: {
    value: '',
    sensitivePaths: ['mongoUri'] as string[],
    description: 'MongoDB URI (empty: in-memory storage)',
  },

  dbName: {
    value: 'auth_service',
    description: 'MongoDB database name',
  },

  // SMTP Configuration
  smtp: {
    value: {
      host: '',
      port: 587,
      secure: false,
      user: '',
      password: '',
      from: '',
    },
    sensitivePaths: ['smtp.password'] as string[],
    description: 'SMTP email configuration (empty host: activation mails are only logged)',
  },

  // Logging
  log: {
    value: {
      level: 'info',
      format: 'json',
    },
    description: 'Logger level and output format',
  },
} as const;

/**
 * Plain default values, keyed like the config
 */
export function getDefaultValues(): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(AUTH_CONFIG_DEFAULTS)) {
    // Nested objects are copied so later merges cannot touch the constants
    values[key] = typeof entry.value === 'object' ? { ...entry.value } : entry.value;
  }
  return values;
}

/**
 * Every sensitive config path (e.g. 'smtp.password')
 */
export function getSensitivePaths(): string[] {
  const paths: string[] = [];
  for (const entry of Object.values(AUTH_CONFIG_DEFAULTS)) {
    if ('sensitivePaths' in entry) {
      paths.push(...entry.sensitivePaths);
    }
  }
  return paths;
}
