import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import OpenAI from 'openai';
import engineConfig, { type EngineConfig } from '../config/engine.config';
import { CustomerServiceGraph } from './customer-service.graph';
import {
  OpenAiReplyPolisher,
  PassthroughReplyPolisher,
  REPLY_POLISHER,
  type ReplyPolisher,
} from './reply-polisher';

export function createReplyPolisher(config: EngineConfig): ReplyPolisher {
  if (!config.openaiApiKey) {
    return new PassthroughReplyPolisher();
  }
  return new OpenAiReplyPolisher(new OpenAI({ apiKey: config.openaiApiKey }), {
    model: config.openaiModel,
    timeoutMs: config.replyTimeoutMs,
  });
}

@Module({
  imports: [ConfigModule.forFeature(engineConfig)],
  providers: [
    {
      provide: REPLY_POLISHER,
      useFactory: createReplyPolisher,
      inject: [engineConfig.KEY],
    },
    CustomerServiceGraph,
  ],
  exports: [CustomerServiceGraph, REPLY_POLISHER],
})
export class CustomerServiceModule {}
