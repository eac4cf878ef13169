import { z } from 'zod';
import { DEFAULT_COMPUTER_MOVE_DELAY_MS } from './game/game_controller';
import { DEFAULT_STRATEGY, parseStrategyName, StrategyName } from './game/strategies';

export interface AppConfig {
  port: number;
  packageName: string;
  apiKey: string;
  cloudHostName: string;
  computerMoveDelayMs: number;
  defaultStrategy: StrategyName;
}

const required = (name: string) =>
  z.string({ required_error: `${name} environment variable is required` })
    .min(1, `${name} environment variable is required`);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(80),
  PACKAGE_NAME: required('PACKAGE_NAME'),
  TPA_API_KEY: required('TPA_API_KEY'),
  CLOUD_HOST_NAME: z.string().min(1).default('cloud'),
  COMPUTER_MOVE_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_COMPUTER_MOVE_DELAY_MS),
  DEFAULT_STRATEGY: z.string().optional(),
});

/**
 * Reads the server configuration from environment variables.
 * Throws on the first missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(issue ? issue.message : 'Invalid environment');
  }

  const { DEFAULT_STRATEGY: strategyText } = parsed.data;
  const defaultStrategy = strategyText ? parseStrategyName(strategyText) : DEFAULT_STRATEGY;
  if (defaultStrategy === null) {
    throw new Error(`DEFAULT_STRATEGY must be one of exhaustive, priority, heuristic (got "${strategyText}")`);
  }

  return {
    port: parsed.data.PORT,
    packageName: parsed.data.PACKAGE_NAME,
    apiKey: parsed.data.TPA_API_KEY,
    cloudHostName: parsed.data.CLOUD_HOST_NAME,
    computerMoveDelayMs: parsed.data.COMPUTER_MOVE_DELAY_MS,
    defaultStrategy,
  };
}
