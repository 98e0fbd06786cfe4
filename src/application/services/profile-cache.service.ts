import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CompanyProfile } from '../../domain/entities/company-profile.entity';
import { extractDomain } from '../../shared/utils/url';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Día (desde epoch) al que pertenece un instante */
export const dayBucket = (nowMs: number): number => Math.floor(nowMs / DAY_MS);

/**
 * Cache en memoria de perfiles ya scrapeados.
 *
 * Clave: "<dominio>_<día>". Un perfil sirve todo el día en que se scrapeó;
 * al día siguiente se vuelve a scrapear. Las entradas de más de
 * `retentionDays` días se borran con evictStale().
 */
@Injectable()
export class ProfileCacheService {
  private readonly logger = new Logger(ProfileCacheService.name);
  private readonly entries = new Map<string, CompanyProfile>();
  private readonly retentionDays: number;

  constructor(private readonly config: ConfigService) {
    this.retentionDays = this.config.get<number>('scraper.cache.retentionDays', 7);
  }

  keyFor(url: string, nowMs: number = Date.now()): string {
    return `${extractDomain(url)}_${dayBucket(nowMs)}`;
  }

  get(url: string, nowMs: number = Date.now()): CompanyProfile | undefined {
    return this.entries.get(this.keyFor(url, nowMs));
  }

  set(url: string, profile: CompanyProfile, nowMs: number = Date.now()): void {
    this.entries.set(this.keyFor(url, nowMs), profile);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Borra entradas viejas y claves mal formadas.
   * @returns cantidad de entradas borradas
   */
  evictStale(nowMs: number = Date.now()): number {
    const today = dayBucket(nowMs);
    let evicted = 0;

    for (const key of [...this.entries.keys()]) {
      const separator = key.lastIndexOf('_');
      const day = separator > 0 ? Number(key.slice(separator + 1)) : NaN;

      if (!Number.isInteger(day) || today - day > this.retentionDays) {
        this.entries.delete(key);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.log(`🧹 ${evicted} perfiles viejos eliminados del cache`);
    }
    return evicted;
  }
}
