/**
 * Open *Facts API v2 envelope (subset we use)
 *
 * The product object stays a loose record: localized fields have dynamic
 * keys (`product_name_fr`, `ingredients_text_de`, ...).
 */

import { z } from 'zod';

export const catalogEnvelopeSchema = z.object({
  code: z.string().optional(),
  status: z.union([z.number(), z.string()]).optional(),
  status_verbose: z.string().optional(),
  product: z.record(z.string(), z.unknown()).optional(),
});

export type CatalogEnvelope = z.infer<typeof catalogEnvelopeSchema>;

export type RawCatalogProduct = Record<string, unknown>;

/** Fields requested from the catalog for one language */
export function catalogFields(languageCode: string): string[] {
  return [
    'code',
    'product_type',
    'product_name',
    `product_name_${languageCode}`,
    'generic_name',
    `generic_name_${languageCode}`,
    'brands',
    'ingredients_text',
    `ingredients_text_${languageCode}`,
    'allergens',
    'allergens_tags',
    'nutriscore_grade',
    'nutrition_grades',
    'nova_group',
    'periods_after_opening',
    'image_url',
    'image_front_url',
    'image_ingredients_url',
    'image_nutrition_url',
  ];
}
