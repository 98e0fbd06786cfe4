import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Logger,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiSecurity } from '@nestjs/swagger';
import { CompanyProfileService } from '../../../application/services/company-profile.service';
import { ScrapeUrlDto } from '../dtos/scrape.dto';
import { CompanyProfileResponseDto } from '../dtos/scrape-response.dto';
import { toProfileResponse } from '../mappers/company-profile.mapper';

@ApiTags('Scrape')
@ApiSecurity('x-api-key')
@Controller('scrape')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class ScrapeController {
  private readonly logger = new Logger(ScrapeController.name);

  constructor(private readonly profileService: CompanyProfileService) {}

  /**
   * POST /scrape
   * Perfil de una empresa a partir de su web (cacheado por día).
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extraer el perfil de una empresa desde su web',
    description:
      'Visita la home y hasta 4 sub-páginas conocidas (/about, /services, ...) ' +
      'para extraer: nombre, descripción, about, productos/servicios, contacto, ' +
      'industria y valores.\n\n' +
      'Todo HTTP puro, sin browser. El resultado se cachea por dominio y día.',
  })
  @ApiResponse({ status: 200, type: CompanyProfileResponseDto })
  @ApiResponse({ status: 400, description: 'URL inválida' })
  async scrape(@Body() dto: ScrapeUrlDto): Promise<CompanyProfileResponseDto> {
    this.logger.log(`🕷️ Scrape: ${dto.websiteUrl}`);

    const profile = await this.profileService.getProfile(dto.websiteUrl, dto.companyName);
    return toProfileResponse(profile);
  }
}
