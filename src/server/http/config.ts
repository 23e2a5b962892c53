export const SERVICE_NAME = 'terragrunt-config-api';

// HTTP server constants (all timeouts in milliseconds)
export const HTTP_SERVER_CONFIG = {
  timeout: 60000, // 60 seconds
  keepAliveTimeout: 60000, // 60 seconds
  headersTimeout: 60000, // 60 seconds
  defaultHost: process.env.TG_API_HOST || '0.0.0.0',
  defaultPort: parseInt(process.env.TG_API_PORT || '3000'),
  bodyLimit: process.env.TG_API_BODY_LIMIT || '1mb',
  apiPrefix: '/tf',
  vpcEndpoint: '/tf/vpc'
} as const;
