import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import type { HealthCheckDto } from '@event-pulse/contract';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  async getHealth(@Res() res: Response): Promise<void> {
    const dbHealth = await this.appService.checkDatabaseHealth();

    const health: HealthCheckDto = {
      status: dbHealth.connected ? 'ok' : 'unhealthy',
      timestamp: new Date().toISOString(),
      db: {
        connected: dbHealth.connected,
        latencyMs: dbHealth.latencyMs,
      },
      discord: {
        connected: this.appService.isBotConnected(),
      },
    };

    res.status(dbHealth.connected ? 200 : 503).json(health);
  }
}
