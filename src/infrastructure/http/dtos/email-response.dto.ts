import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CompanyProfileResponseDto } from './scrape-response.dto';

export class EmailResponseDto {
  @ApiProperty({ example: 'Cutting downtime at Acme Robotics' })
  emailSubject!: string;

  @ApiProperty({ example: 'Dear Acme Robotics Team,\n\n...' })
  emailBody!: string;

  @ApiProperty({ type: CompanyProfileResponseDto })
  companyInfo!: CompanyProfileResponseDto;
}

export class SentEmailDataDto {
  @ApiPropertyOptional({ example: '<0f1c@northwind.example>' })
  messageId?: string;

  @ApiPropertyOptional({ type: CompanyProfileResponseDto })
  companyInfo?: CompanyProfileResponseDto;

  @ApiPropertyOptional({ example: 'Cutting downtime at Acme Robotics' })
  emailSubject?: string;
}

export class SendEmailResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: 'Email successfully sent to ceo@acme.example' })
  message!: string;

  @ApiPropertyOptional({ type: SentEmailDataDto })
  data?: SentEmailDataDto;
}
