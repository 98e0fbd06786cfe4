import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

/**
 * DTO para redactar un email a partir de la web de una empresa.
 */
export class GenerateEmailDto {
  @ApiProperty({ description: 'URL de la web de la empresa a analizar', example: 'https://acme.example/' })
  @IsString()
  @IsNotEmpty()
  @IsUrl({ require_protocol: true }, { message: 'Debe ser una URL válida (http:// o https://)' })
  @Transform(trim)
  websiteUrl!: string;

  @ApiPropertyOptional({ description: 'Nombre de la empresa, si ya se conoce', example: 'Acme Robotics' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  @Transform(trim)
  companyName?: string;

  @ApiPropertyOptional({ description: 'Nombre del remitente', example: 'Jordan Lee' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  @Transform(trim)
  senderName?: string;

  @ApiPropertyOptional({ description: 'Empresa del remitente', example: 'Northwind AI' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  @Transform(trim)
  senderCompany?: string;
}

/**
 * DTO para enviar un email ya redactado.
 */
export class SendEmailDto {
  @ApiProperty({ description: 'Destinatario', example: 'ceo@acme.example' })
  @IsEmail()
  toEmail!: string;

  @ApiProperty({ description: 'Asunto', example: 'Cutting downtime at Acme Robotics' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  subject!: string;

  @ApiProperty({ description: 'Cuerpo (texto plano)' })
  @IsString()
  @IsNotEmpty()
  body!: string;

  @ApiPropertyOptional({ description: 'Nombre visible del remitente', example: 'Jordan Lee' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  fromName?: string;

  @ApiPropertyOptional({ type: [String], description: 'Copias' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsEmail({}, { each: true })
  cc?: string[];

  @ApiPropertyOptional({ type: [String], description: 'Copias ocultas' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsEmail({}, { each: true })
  bcc?: string[];
}

/**
 * DTO para redactar + enviar en un solo paso.
 */
export class GenerateAndSendEmailDto extends GenerateEmailDto {
  @ApiProperty({ description: 'Destinatario', example: 'ceo@acme.example' })
  @IsEmail()
  toEmail!: string;

  @ApiPropertyOptional({ description: 'Teléfono del remitente', example: '+1 555 010 9999' })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  senderPhone?: string;

  @ApiPropertyOptional({ description: 'Web del remitente', example: 'https://northwind.example' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  senderWebsite?: string;

  @ApiPropertyOptional({ type: [String], description: 'Copias' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsEmail({}, { each: true })
  cc?: string[];

  @ApiPropertyOptional({ type: [String], description: 'Copias ocultas' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsEmail({}, { each: true })
  bcc?: string[];
}
