import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'wallet-ledger',
      version: '1.0.0',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Wallet Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        fills: '/fills?wallet=',
        funding: '/funding?wallet=',
        timeline: '/timeline?wallet=',
        pnl: '/pnl?wallet=',
        dailyPnl: '/pnl/daily?wallet=',
        marketPrices: '/market-prices',
      },
    };
  }
}
