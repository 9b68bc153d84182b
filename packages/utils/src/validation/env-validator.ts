import { QuarryEnvSchema, type QuarryEnvConfig } from '@quarry/schemas';
import { logger } from '../logger/logger';

/**
 * Validate environment variables on application startup.
 *
 * @param env - Source of variables (defaults to process.env, after dotenv has loaded .env)
 * @returns Validated environment configuration
 * @throws Exits process if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): QuarryEnvConfig {
  const result = QuarryEnvSchema.safeParse(env);
  if (result.success) {
    logger.debug({ gatewayUrl: result.data.QUARRY_GATEWAY_URL }, 'Environment variables validated');
    return result.data;
  }

  logger.error('Invalid environment variables:');
  for (const issue of result.error.issues) {
    logger.error({ variable: issue.path.join('.'), issue: issue.message });
  }
  logger.error('Check .env against the documented QUARRY_* variables.');
  process.exit(1);
}
