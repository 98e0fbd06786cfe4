/** Campos de texto del perfil. Se escriben una sola vez (la primera página gana). */
export type ProfileTextField = 'name' | 'description' | 'about' | 'contact' | 'industry';

/** Campos de lista del perfil. Acumulan entre páginas, sin duplicados. */
export type ProfileListField = 'productsServices' | 'values' | 'team' | 'clients';

/**
 * Perfil de una empresa armado a partir de su web.
 * Entidad de dominio — no depende de frameworks.
 *
 * Todos los campos de texto arrancan en "" y las listas en [] (nunca null),
 * así los consumidores (generación de emails) no tienen que chequear ausencias.
 */
export class CompanyProfile {
  /** URL base desde donde se extrajo */
  sourceUrl: string;

  /** Nombre de la empresa */
  name: string;

  /** Breve descripción / tagline */
  description: string;

  /** Texto "quiénes somos" */
  about: string;

  /** Productos y servicios detectados */
  productsServices: string[];

  /** Fragmentos de contacto unidos con " | " ("Email: ...", "Phone: ...", redes) */
  contact: string;

  /** Industria (inferida por keywords si la web no la declara) */
  industry: string;

  /** Valores corporativos / misión */
  values: string[];

  /** Reservado — ningún extractor lo llena todavía */
  team: string[];

  /** Reservado — ningún extractor lo llena todavía */
  clients: string[];

  /** URLs que respondieron 200 y se procesaron */
  pagesScraped: string[];

  /** Timestamp de extracción */
  scrapedAt: Date;

  /** Duración total del scraping en ms */
  durationMs: number;

  constructor(sourceUrl: string) {
    this.sourceUrl = sourceUrl;
    this.name = '';
    this.description = '';
    this.about = '';
    this.productsServices = [];
    this.contact = '';
    this.industry = '';
    this.values = [];
    this.team = [];
    this.clients = [];
    this.pagesScraped = [];
    this.scrapedAt = new Date();
    this.durationMs = 0;
  }

  /**
   * Escribe el campo solo si todavía está vacío.
   * @returns true si el valor quedó escrito
   */
  fill(field: ProfileTextField, value: string): boolean {
    if (this[field] || !value) return false;
    this[field] = value;
    return true;
  }

  /**
   * Agrega un item a la lista si no existe ya (match exacto).
   * @returns true si se agregó
   */
  append(field: ProfileListField, item: string): boolean {
    if (!item || this[field].includes(item)) return false;
    this[field].push(item);
    return true;
  }

  /** Copia independiente (las listas no se comparten con el original) */
  clone(): CompanyProfile {
    const copy = new CompanyProfile(this.sourceUrl);
    copy.name = this.name;
    copy.description = this.description;
    copy.about = this.about;
    copy.productsServices = [...this.productsServices];
    copy.contact = this.contact;
    copy.industry = this.industry;
    copy.values = [...this.values];
    copy.team = [...this.team];
    copy.clients = [...this.clients];
    copy.pagesScraped = [...this.pagesScraped];
    copy.scrapedAt = new Date(this.scrapedAt.getTime());
    copy.durationMs = this.durationMs;
    return copy;
  }

  /** Cuántos campos se lograron extraer */
  get fieldsExtracted(): number {
    let count = 0;
    if (this.name) count++;
    if (this.description) count++;
    if (this.about) count++;
    if (this.productsServices.length > 0) count++;
    if (this.contact) count++;
    if (this.industry) count++;
    if (this.values.length > 0) count++;
    return count;
  }

  /** Resumen para logging */
  get summary(): string {
    const fields: string[] = [];
    if (this.name) fields.push(`name="${this.name}"`);
    if (this.industry) fields.push(`industry=${this.industry}`);
    if (this.productsServices.length) fields.push(`services=${this.productsServices.length}`);
    if (this.values.length) fields.push(`values=${this.values.length}`);
    if (this.about) fields.push('about');
    if (this.contact) fields.push('contact');
    return `[${this.fieldsExtracted} fields] ${fields.join(', ')}`;
  }
}
