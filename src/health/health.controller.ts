import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import type { Response } from 'express';
import { StagingService } from '../staging/staging.service';

export type ComponentStatus = 'up' | 'down';

export interface HealthResponse {
  status: ComponentStatus;
  details: {
    staging: ComponentStatus;
  };
}

@Controller('health')
export class HealthController {
  constructor(private readonly stagingService: StagingService) {}

  /**
   * Up when the staging root is writable; 503 otherwise
   */
  @Get()
  async check(
    @Res({ passthrough: true }) res: Response,
  ): Promise<HealthResponse> {
    const staging: ComponentStatus = (await this.stagingService.isWritable())
      ? 'up'
      : 'down';

    if (staging === 'down') {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }

    return { status: staging, details: { staging } };
  }
}
