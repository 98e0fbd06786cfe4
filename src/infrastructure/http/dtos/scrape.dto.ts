import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsString, IsNotEmpty, IsOptional, IsUrl, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

/**
 * DTO para scraping directo de una URL.
 */
export class ScrapeUrlDto {
  @ApiProperty({
    description: 'URL de la página web de la empresa',
    example: 'https://acme.example/',
  })
  @IsString()
  @IsNotEmpty()
  @IsUrl({ require_protocol: true }, { message: 'Debe ser una URL válida (http:// o https://)' })
  @Transform(trim)
  websiteUrl!: string;

  @ApiPropertyOptional({
    description: 'Nombre de la empresa, si ya se conoce (pisa al extraído)',
    example: 'Acme Robotics',
  })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  @Transform(trim)
  companyName?: string;
}
