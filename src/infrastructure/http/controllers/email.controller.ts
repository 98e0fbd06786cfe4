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
import { OutreachService } from '../../../application/services/outreach.service';
import { GenerateAndSendEmailDto, GenerateEmailDto, SendEmailDto } from '../dtos/email.dto';
import { EmailResponseDto, SendEmailResponseDto } from '../dtos/email-response.dto';
import { toProfileResponse } from '../mappers/company-profile.mapper';

@ApiTags('Email')
@ApiSecurity('x-api-key')
@Controller('email')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class EmailController {
  private readonly logger = new Logger(EmailController.name);

  constructor(private readonly outreach: OutreachService) {}

  /**
   * POST /email/generate
   * Scraping (o cache) + redacción del email.
   */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Redactar un email en frío para una empresa',
    description:
      'Extrae el perfil de la web de la empresa y redacta un email personalizado. ' +
      'Si el modelo no está disponible devuelve un email genérico de respaldo.',
  })
  @ApiResponse({ status: 200, type: EmailResponseDto })
  @ApiResponse({ status: 400, description: 'URL inválida' })
  async generate(@Body() dto: GenerateEmailDto): Promise<EmailResponseDto> {
    this.logger.log(`✉️  Generate: ${dto.websiteUrl}`);

    const draft = await this.outreach.generateEmail(dto);
    return {
      emailSubject: draft.subject,
      emailBody: draft.body,
      companyInfo: toProfileResponse(draft.profile),
    };
  }

  /**
   * POST /email/send
   * Entrega de un email ya redactado.
   */
  @Post('send')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Enviar un email vía SMTP' })
  @ApiResponse({ status: 200, type: SendEmailResponseDto })
  @ApiResponse({ status: 503, description: 'SMTP no configurado' })
  async send(@Body() dto: SendEmailDto): Promise<SendEmailResponseDto> {
    const result = await this.outreach.sendEmail({
      to: dto.toEmail,
      subject: dto.subject,
      body: dto.body,
      fromName: dto.fromName,
      cc: dto.cc,
      bcc: dto.bcc,
    });

    return {
      success: result.success,
      message: result.message,
      data: result.messageId ? { messageId: result.messageId } : undefined,
    };
  }

  /**
   * POST /email/generate-and-send
   * Redacción + entrega en un solo paso.
   */
  @Post('generate-and-send')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Redactar y enviar un email en un solo paso',
    description: 'Combina `/email/generate` + `/email/send` en una sola llamada.',
  })
  @ApiResponse({ status: 200, type: SendEmailResponseDto })
  @ApiResponse({ status: 503, description: 'SMTP no configurado' })
  async generateAndSend(@Body() dto: GenerateAndSendEmailDto): Promise<SendEmailResponseDto> {
    this.logger.log(`✉️➜📤 Generate+Send: ${dto.websiteUrl} → ${dto.toEmail}`);

    const result = await this.outreach.generateAndSend(dto);
    return {
      success: result.success,
      message: result.message,
      data: {
        messageId: result.messageId,
        companyInfo: toProfileResponse(result.profile),
        emailSubject: result.subject,
      },
    };
  }
}
