import { ApiProperty } from '@nestjs/swagger';

export class CompanyProfileResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: 'https://acme.example/' })
  sourceUrl!: string;

  @ApiProperty({ example: 'Acme Robotics' })
  name!: string;

  @ApiProperty({ example: 'Industrial automation for small factories' })
  description!: string;

  @ApiProperty({ example: 'Acme Robotics was founded to bring affordable automation...' })
  about!: string;

  @ApiProperty({ example: ['Robotic Arms', 'Fleet Monitoring'] })
  productsServices!: string[];

  @ApiProperty({ example: 'Email: hello@acme.example | Phone: +1 555 010 2030' })
  contact!: string;

  @ApiProperty({ example: 'Manufacturing' })
  industry!: string;

  @ApiProperty({ example: ['Quality', 'Safety'] })
  values!: string[];

  @ApiProperty({ example: [] })
  team!: string[];

  @ApiProperty({ example: [] })
  clients!: string[];

  @ApiProperty({ example: ['https://acme.example/', 'https://acme.example/about'] })
  pagesScraped!: string[];

  @ApiProperty({ example: 7 })
  fieldsExtracted!: number;

  @ApiProperty({ example: 2310 })
  durationMs!: number;

  @ApiProperty({ example: '2026-02-13T10:30:00.000Z' })
  scrapedAt!: string;
}
