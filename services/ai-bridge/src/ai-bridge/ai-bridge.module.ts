import { DynamicModule, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  AI_BRIDGE_CONFIG_NAMESPACE,
  AIBridgeConfig,
  AIBridgeConfigOverrides,
  aiBridgeConfig,
  describeMissingCredential,
  loadAIBridgeConfig,
} from '../config/ai-bridge.config';
import { validateEnvironment } from '../config/env.validation';
import { applyLogLevel } from '../config/log-level';
import { AdapterRegistry, DEFAULT_ADAPTER_REGISTRY } from './adapters/adapter-registry';
import { ADAPTER_REGISTRY, AI_BRIDGE_CONFIG } from './adapters/tokens';
import { AIBridgeService } from './ai-bridge.service';

export interface AIBridgeModuleOptions {
  /**
   * Programmatic settings; each one wins over its environment variable
   */
  config?: AIBridgeConfigOverrides;
  /**
   * Replaces the provider table (tests, additional vendors)
   */
  registry?: AdapterRegistry;
  isGlobal?: boolean;
  envFilePath?: string;
}

/**
 * AIBridgeModule
 *
 * Providers:
 * - AI_BRIDGE_CONFIG: frozen AIBridgeConfig (environment + forRoot overrides)
 * - ADAPTER_REGISTRY: provider name -> adapter factory table
 * - AIBridgeService: the facade
 *
 * The configured log level is applied to the Nest logger when the
 * configuration is built; a default provider without credentials is
 * reported with a warning.
 */
@Module({})
export class AIBridgeModule {
  private static readonly logger = new Logger(AIBridgeModule.name);

  static forRoot(options: AIBridgeModuleOptions = {}): DynamicModule {
    return {
      module: AIBridgeModule,
      global: options.isGlobal ?? false,
      imports: [
        ConfigModule.forRoot({
          envFilePath: options.envFilePath ?? '.env',
          load: [aiBridgeConfig],
          validate: validateEnvironment,
        }),
      ],
      providers: [
        {
          provide: AI_BRIDGE_CONFIG,
          useFactory: (configService: ConfigService): AIBridgeConfig => {
            const fromEnv = configService.get<AIBridgeConfig>(AI_BRIDGE_CONFIG_NAMESPACE);
            const config = loadAIBridgeConfig({}, { ...fromEnv, ...options.config });
            applyLogLevel(config.logLevel);

            const warning = describeMissingCredential(config);
            if (warning !== undefined) {
              AIBridgeModule.logger.warn(warning);
            }
            return config;
          },
          inject: [ConfigService],
        },
        {
          provide: ADAPTER_REGISTRY,
          useValue: options.registry ?? DEFAULT_ADAPTER_REGISTRY,
        },
        AIBridgeService,
      ],
      exports: [AIBridgeService, AI_BRIDGE_CONFIG],
    };
  }
}
