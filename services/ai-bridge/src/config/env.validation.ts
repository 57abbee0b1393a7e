import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { PROVIDER_NAMES } from '../ai-bridge/types';
import { BRIDGE_LOG_LEVELS } from './log-level';

/**
 * Environment variables read by the bridge.
 * Unrelated variables pass through untouched.
 */
export class AIBridgeEnvironment {
  @IsOptional()
  @IsIn(PROVIDER_NAMES)
  AI_BRIDGE_PROVIDER?: string;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  GOOGLE_GEMINI_API_KEY?: string;

  @IsOptional()
  @IsIn(BRIDGE_LOG_LEVELS)
  AI_BRIDGE_LOG_LEVEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  AI_BRIDGE_TIMEOUT?: number;
}

/**
 * Blank values count as unset, as in loadAIBridgeConfig()
 */
function withoutBlankValues(config: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(config).filter(
      ([, value]) => !(typeof value === 'string' && value.trim().length === 0),
    ),
  );
}

/**
 * `validate` hook for ConfigModule.forRoot()
 *
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(AIBridgeEnvironment, withoutBlankValues(config), {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid AI bridge environment: ${details}`);
  }

  return config;
}
