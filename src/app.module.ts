import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import engineConfig, { type EngineConfig } from './config/engine.config';
import {
  createSearchIndex,
  createStateStore,
} from './config/store.factory';
import { ConversationEngineModule } from './conversation-engine.module';
import { CustomerServiceModule } from './customer-service/customer-service.module';
import { CUSTOMER_SERVICE_GRAPH_ID } from './customer-service/customer-service.constants';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [engineConfig],
    }),
    CustomerServiceModule,
    ConversationEngineModule.forRootAsync({
      imports: [ConfigModule.forFeature(engineConfig)],
      inject: [engineConfig.KEY],
      useFactory: async (config: EngineConfig) => ({
        store: await createStateStore(config),
        searchIndex: await createSearchIndex(config),
        defaultGraphId: CUSTOMER_SERVICE_GRAPH_ID,
        maxSteps: config.maxSteps,
        indexMaxAttempts: config.indexMaxAttempts,
        indexRetryDelayMs: config.indexRetryDelayMs,
      }),
    }),
  ],
})
export class AppModule {}
