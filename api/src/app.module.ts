import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AgentsModule } from './agents/agents.module';
import { AppController } from './app.controller';
import { validateEnv } from './config/env.validation';
import { JourneysModule } from './journeys/journeys.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    AgentsModule,
    JourneysModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
