import { Module } from '@nestjs/common';
import { AgentsModule } from '../agents/agents.module';
import { JourneysController } from './journeys.controller';
import { JourneysService } from './journeys.service';

@Module({
  imports: [AgentsModule],
  controllers: [JourneysController],
  providers: [JourneysService],
})
export class JourneysModule {}
