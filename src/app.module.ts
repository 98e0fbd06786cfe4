import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { OutreachModule } from './infrastructure/http/outreach.module';
import { scraperConfig } from './shared/config/scraper.config';
import { outreachConfig } from './shared/config/outreach.config';
import { ApiKeyGuard } from './infrastructure/auth/api-key.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [scraperConfig, outreachConfig],
      envFilePath: ['.env', '.env.local'],
    }),
    OutreachModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
  ],
})
export class AppModule {}
