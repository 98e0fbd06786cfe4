import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import { EmailGeneratorPort, GeneratedEmail, SenderInfo } from '../../domain/ports/email-generator.port';
import { buildEmailPrompt, buildFallbackEmail, parseEmailCompletion } from '../../shared/utils/email-template';

export const CHAT_COMPLETION_CLIENT = 'CHAT_COMPLETION_CLIENT';

export interface ChatMessage {
  role: 'user';
  content: string;
}

/** Lo único que usamos del cliente de OpenAI */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        temperature: number;
        max_tokens: number;
        messages: ChatMessage[];
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/** Cliente real, o null si no hay OPENAI_API_KEY */
export function createChatCompletionClient(config: ConfigService): ChatCompletionClient | null {
  const apiKey = config.get<string>('outreach.openai.apiKey', '');
  return apiKey ? new OpenAI({ apiKey }) : null;
}

/**
 * Redacta emails en frío con un modelo de chat de OpenAI.
 * Sin cliente, sin respuesta o con error → email de respaldo.
 */
@Injectable()
export class OpenAiEmailGeneratorAdapter implements EmailGeneratorPort {
  private readonly logger = new Logger(OpenAiEmailGeneratorAdapter.name);
  private readonly model: string;

  constructor(
    @Inject(CHAT_COMPLETION_CLIENT)
    private readonly client: ChatCompletionClient | null,
    private readonly config: ConfigService,
  ) {
    this.model = this.config.get<string>('outreach.openai.model', 'gpt-4o-mini');
    if (!this.client) {
      this.logger.warn('⚠️  OPENAI_API_KEY no configurada — se usará el email de respaldo');
    }
  }

  async generate(profile: CompanyProfile, sender: SenderInfo): Promise<GeneratedEmail> {
    const company = profile.name || profile.sourceUrl;

    if (!this.client) {
      return buildFallbackEmail(profile, sender);
    }

    try {
      this.logger.log(`✉️  Generando email para ${company}`);
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.7,
        max_tokens: 800,
        messages: [{ role: 'user', content: buildEmailPrompt(profile, sender) }],
      });

      const text = response.choices[0]?.message?.content;
      const email = text ? parseEmailCompletion(text, sender) : null;
      if (!email) {
        this.logger.warn(`⚠️  Respuesta vacía del modelo para ${company}`);
        return buildFallbackEmail(profile, sender);
      }

      this.logger.log(`✅ Email generado: "${email.subject}"`);
      return email;
    } catch (error) {
      this.logger.error(`❌ Error generando email para ${company}: ${(error as Error).message}`);
      return buildFallbackEmail(profile, sender);
    }
  }
}
