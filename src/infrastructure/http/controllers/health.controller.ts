import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';

export const API_VERSION = '1.0.0';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  /**
   * GET /health
   * Healthcheck básico.
   */
  @Public()
  @Get()
  @ApiOperation({ summary: 'Healthcheck (público, no requiere API key)' })
  health(): { status: string; version: string } {
    return { status: 'healthy', version: API_VERSION };
  }
}
