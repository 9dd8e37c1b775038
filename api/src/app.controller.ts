import { Controller, Get } from '@nestjs/common';

export const SERVICE_NAME = 'Smart Transit AI Agents';

@Controller()
export class AppController {
  @Get()
  banner() {
    return {
      service: SERVICE_NAME,
      agents: 7,
      status: 'active',
      capabilities: ['route_optimization', 'personalization', 'multilingual', 'real_time'],
    };
  }
}
