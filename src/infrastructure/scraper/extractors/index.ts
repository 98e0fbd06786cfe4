import { FieldExtractor } from '../strategy';
import { nameExtractor } from './name.extractor';
import { descriptionExtractor } from './description.extractor';
import { aboutExtractor } from './about.extractor';
import { productsServicesExtractor } from './products-services.extractor';
import { contactExtractor } from './contact.extractor';
import { valuesExtractor } from './values.extractor';

/**
 * Orden en que corren los extractores sobre cada página.
 * Values va último porque usa about y description como fallback.
 */
export const FIELD_EXTRACTORS: readonly FieldExtractor[] = [
  nameExtractor,
  descriptionExtractor,
  aboutExtractor,
  productsServicesExtractor,
  contactExtractor,
  valuesExtractor,
];

export { nameExtractor, descriptionExtractor, aboutExtractor, productsServicesExtractor, contactExtractor, valuesExtractor };
