import { Injectable } from '@nestjs/common';
import { HealthResponse } from '@statement-insights/shared';

@Injectable()
export class HealthService {
  getHealth(): HealthResponse {
    return { status: 'ok', uptimeSeconds: Math.round(process.uptime()) };
  }
}
