import { Controller, Get, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AdcpWebhookService } from '../services/adcp-webhook.service';
import {
  ApiHealthCheck,
  ApiPipelineStatistics,
} from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly webhookService: AdcpWebhookService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): {
    status: string;
    timestamp: Date;
    uptime: number;
  } {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('stats')
  @ApiPipelineStatistics()
  statistics(): ReturnType<AdcpWebhookService['getStatistics']> {
    return this.webhookService.getStatistics();
  }
}
